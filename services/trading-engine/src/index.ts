import { apiConfig, loadConfig } from '@tiered/config';
import { errorMessage } from '@tiered/errors';
import { createServiceLogger } from '@tiered/logger';
import { createEngine } from './engine.js';

const logger = createServiceLogger('trading-engine');

async function main() {
  logger.info('Starting trading engine...');

  const env = loadConfig();
  const engine = await createEngine(env);
  const api = apiConfig(env);

  const server = engine.app.listen(api.port, api.host, () => {
    logger.info({ port: api.port, host: api.host }, 'Trading engine started');
  });
  engine.monitor.start();

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down trading engine...');

    const report = await engine.shutdown();
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    await engine.factory.close();
    process.exit(report.every((step) => step.ok) ? 0 : 1);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error: errorMessage(error) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((error: unknown) => {
  logger.error({ error: errorMessage(error) }, 'Failed to start trading engine');
  process.exit(1);
});
