import { errorMessage, withTimeout } from '@tiered/errors';
import { createServiceLogger, type Logger } from '@tiered/logger';
import type { RepositoryFactory } from './factory.js';

export type ShutdownStep = 'stopIntake' | 'drain' | 'forceSync' | 'forceDump' | 'statistics';

export interface ShutdownStepReport {
  step: ShutdownStep;
  ok: boolean;
  durationMs: number;
  result?: unknown;
  error?: string;
}

export interface ShutdownOptions {
  factory: Pick<
    RepositoryFactory,
    'closeStreams' | 'stopMaintenance' | 'drainAll' | 'forceSyncAll' | 'forceDumpAll' | 'statistics'
  >;
  /** Stops producers outside storage, such as the stale-order monitor. */
  stopProducers?: () => Promise<void> | void;
  drainTimeoutMs: number;
  stepTimeoutMs: number;
  logger?: Logger;
}

/**
 * Flushes both tiers in a fixed order. Every step is bounded and a failing
 * step never stops the ones after it.
 */
export class ShutdownCoordinator {
  private readonly logger: Logger;
  private running: Promise<ShutdownStepReport[]> | null = null;

  constructor(private readonly options: ShutdownOptions) {
    this.logger = options.logger ?? createServiceLogger('shutdown');
  }

  /** Idempotent: a second call returns the first run's report. */
  shutdown(): Promise<ShutdownStepReport[]> {
    this.running ??= this.run();
    return this.running;
  }

  private async run(): Promise<ShutdownStepReport[]> {
    const { factory, drainTimeoutMs } = this.options;
    this.logger.info('Shutdown started');

    const report = [
      await this.step('stopIntake', async () => {
        await this.options.stopProducers?.();
        await factory.stopMaintenance();
        await factory.closeStreams();
      }),
      await this.step('drain', () => factory.drainAll(drainTimeoutMs)),
      await this.step('forceSync', () => factory.forceSyncAll()),
      await this.step('forceDump', () => factory.forceDumpAll()),
      await this.step('statistics', () => factory.statistics()),
    ];

    const failed = report.filter((entry) => !entry.ok).map((entry) => entry.step);
    this.logger.info({ failed, steps: report }, 'Shutdown finished');
    return report;
  }

  private async step(step: ShutdownStep, action: () => Promise<unknown>): Promise<ShutdownStepReport> {
    const started = Date.now();
    try {
      const result = await withTimeout(action(), this.options.stepTimeoutMs, `shutdown step ${step}`);
      return { step, ok: true, durationMs: Date.now() - started, result };
    } catch (error) {
      this.logger.error({ step, error: errorMessage(error) }, 'Shutdown step failed');
      return { step, ok: false, durationMs: Date.now() - started, error: errorMessage(error) };
    }
  }
}
