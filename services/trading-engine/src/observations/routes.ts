import { Router } from 'express';
import { z } from 'zod';
import { NotFoundError, ServiceUnavailableError } from '@tiered/errors';
import {
  STREAM_KINDS,
  indicatorSchema,
  orderBookSchema,
  tickerSchema,
  type ObservationSchema,
  type RepositoryFactory,
  type StreamRepository,
} from '@tiered/storage';
import type { Observation, ObservationKind } from '@tiered/types';
import { asyncHandler } from '../middleware/errorHandler.js';

const kindSchema = z.enum(STREAM_KINDS);

const MAX_BATCH = 5000;

function ingest<T extends Observation>(
  kind: ObservationKind,
  repository: StreamRepository<T>,
  schema: ObservationSchema<T>,
  body: unknown
): number {
  const { records } = z.object({ records: z.array(schema.record).min(1).max(MAX_BATCH) }).parse(body);
  if (!repository.appendBatch(records)) {
    throw new ServiceUnavailableError(`${kind} stream`);
  }
  return records.length;
}

function latest<T extends Observation>(kind: ObservationKind, repository: StreamRepository<T>, symbol: string): T {
  const record = repository.latest(symbol);
  if (record === undefined) {
    throw new NotFoundError(`${kind} observation`, symbol);
  }
  return record;
}

async function ingestKind(factory: RepositoryFactory, kind: ObservationKind, body: unknown): Promise<number> {
  switch (kind) {
    case 'tickers':
      return ingest(kind, await factory.get('tickers'), tickerSchema, body);
    case 'orderBooks':
      return ingest(kind, await factory.get('orderBooks'), orderBookSchema, body);
    case 'indicators':
      return ingest(kind, await factory.get('indicators'), indicatorSchema, body);
  }
}

export function createObservationsRouter(factory: RepositoryFactory) {
  const router = Router();

  router.post(
    '/:kind',
    asyncHandler(async (req, res) => {
      const kind = kindSchema.parse(req.params['kind']);
      const accepted = await ingestKind(factory, kind, req.body);

      res.status(202).json({ accepted });
    })
  );

  router.get(
    '/:kind/:symbol/latest',
    asyncHandler(async (req, res) => {
      const kind = kindSchema.parse(req.params['kind']);
      const symbol = z.string().min(1).parse(req.params['symbol']).toUpperCase().replace('-', '/');

      switch (kind) {
        case 'tickers':
          res.json(latest(kind, await factory.get('tickers'), symbol));
          return;
        case 'orderBooks':
          res.json(latest(kind, await factory.get('orderBooks'), symbol));
          return;
        case 'indicators':
          res.json(latest(kind, await factory.get('indicators'), symbol));
          return;
      }
    })
  );

  return router;
}
