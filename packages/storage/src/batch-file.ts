import { mkdir, readdir, readFile, rename, stat, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { promisify } from 'util';
import { gunzip, gzip } from 'zlib';
import { format, subDays } from 'date-fns';
import { z } from 'zod';
import type { ObservationKind } from '@tiered/types';
import { fromColumns, toColumns, type ObservationSchema } from './observation-schema.js';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export const BATCH_FORMAT = 'columnar-json';
export const BATCH_VERSION = 1;
const BATCH_SUFFIX = '.columnar.json.gz';

const batchFileSchema = z.object({
  format: z.literal(BATCH_FORMAT),
  version: z.literal(BATCH_VERSION),
  kind: z.enum(['tickers', 'orderBooks', 'indicators']),
  columns: z.array(z.object({ name: z.string(), type: z.string() })),
  rowCount: z.number().int().nonnegative(),
  createdAt: z.number().int(),
  data: z.record(z.array(z.unknown())),
});

export type BatchFile = z.infer<typeof batchFileSchema>;

export function batchFileName(kind: ObservationKind, at: Date, sequence: number): string {
  return `${kind}_${format(at, 'yyyyMMdd_HHmmss_SSS')}_${sequence}${BATCH_SUFFIX}`;
}

export function isBatchFileOf(kind: ObservationKind, fileName: string): boolean {
  return fileName.startsWith(`${kind}_`) && fileName.endsWith(BATCH_SUFFIX);
}

/**
 * Writes one gzip-compressed columnar batch. The file only appears under its
 * final name once fully written.
 */
export async function writeBatchFile<T>(
  dir: string,
  schema: ObservationSchema<T>,
  records: readonly T[],
  sequence: number,
  at: Date = new Date()
): Promise<string> {
  const file: BatchFile = {
    format: BATCH_FORMAT,
    version: BATCH_VERSION,
    kind: schema.kind,
    columns: schema.columns.map((column) => ({ name: column.name, type: column.type })),
    rowCount: records.length,
    createdAt: at.getTime(),
    data: toColumns(schema, records),
  };

  await mkdir(dir, { recursive: true });
  const location = join(dir, batchFileName(schema.kind, at, sequence));
  const temporary = `${location}.tmp`;

  await writeFile(temporary, await gzipAsync(JSON.stringify(file)));
  await rename(temporary, location);
  return location;
}

export async function readBatchFile(location: string): Promise<BatchFile> {
  const raw = await gunzipAsync(await readFile(location));
  return batchFileSchema.parse(JSON.parse(raw.toString('utf8')));
}

export function decodeBatch<T>(schema: ObservationSchema<T>, file: BatchFile): T[] {
  return fromColumns(schema, file.data, file.rowCount);
}

/**
 * Deletes this kind's batch files last modified before the retention
 * window. Returns the deleted paths.
 */
export async function sweepBatchFiles(
  dir: string,
  kind: ObservationKind,
  retentionDays: number,
  now: Date = new Date()
): Promise<string[]> {
  const cutoff = subDays(now, retentionDays).getTime();
  const deleted: string[] = [];

  for (const fileName of await readdir(dir)) {
    if (!isBatchFileOf(kind, fileName)) continue;

    const location = join(dir, fileName);
    const info = await stat(location);
    if (info.mtimeMs < cutoff) {
      await unlink(location);
      deleted.push(location);
    }
  }
  return deleted;
}
