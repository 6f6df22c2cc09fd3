import { errorMessage } from '@tiered/errors';

export type Task = () => Promise<void>;

export interface TaskPoolOptions {
  maxInFlight: number;
  /** Distinct keys allowed to wait; further keys are dropped. */
  maxQueued: number;
  onError?: (key: string, error: unknown) => void;
  onDrop?: (key: string) => void;
}

export type ScheduleResult = 'queued' | 'coalesced' | 'dropped';

export interface TaskPoolStats {
  scheduled: number;
  coalesced: number;
  succeeded: number;
  failed: number;
  dropped: number;
  queued: number;
  inFlight: number;
  lastError?: string;
}

/**
 * Bounded background runner keyed by entity id. A key waiting in the queue
 * holds only its latest task, and one key never runs twice at once.
 */
export class TaskPool {
  private readonly queue = new Map<string, Task>();
  private readonly running = new Map<string, Promise<void>>();
  private readonly idleWaiters: Array<() => void> = [];
  private pauses = 0;
  private readonly counters = { scheduled: 0, coalesced: 0, succeeded: 0, failed: 0, dropped: 0 };
  private lastError: string | undefined;

  constructor(private readonly options: TaskPoolOptions) {}

  schedule(key: string, task: Task): ScheduleResult {
    this.counters.scheduled++;

    if (this.queue.has(key)) {
      this.queue.set(key, task);
      this.counters.coalesced++;
      return 'coalesced';
    }
    if (this.queue.size >= this.options.maxQueued) {
      this.counters.dropped++;
      this.options.onDrop?.(key);
      return 'dropped';
    }

    this.queue.set(key, task);
    this.pump();
    return 'queued';
  }

  get isPaused(): boolean {
    return this.pauses > 0;
  }

  /** Stops starting new tasks and resolves once the running ones settle. */
  async pause(): Promise<void> {
    this.pauses++;
    await Promise.all(Array.from(this.running.values()));
  }

  resume(): void {
    if (this.pauses === 0) return;
    this.pauses--;
    this.pump();
  }

  /**
   * Resolves true once nothing is queued or running, or false when the
   * timeout passes first.
   */
  async drain(timeoutMs: number): Promise<boolean> {
    if (this.isIdle()) return true;

    let timer: NodeJS.Timeout | undefined;
    const idle = new Promise<boolean>((resolve) => {
      this.idleWaiters.push(() => resolve(true));
    });
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([idle, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  getStats(): TaskPoolStats {
    return {
      ...this.counters,
      queued: this.queue.size,
      inFlight: this.running.size,
      lastError: this.lastError,
    };
  }

  private isIdle(): boolean {
    return this.queue.size === 0 && this.running.size === 0;
  }

  private pump(): void {
    while (this.pauses === 0 && this.running.size < this.options.maxInFlight) {
      const next = this.nextRunnable();
      if (next === undefined) break;

      const [key, task] = next;
      this.queue.delete(key);
      this.running.set(key, this.run(key, task));
    }
  }

  private nextRunnable(): [string, Task] | undefined {
    for (const entry of this.queue) {
      if (!this.running.has(entry[0])) return entry;
    }
    return undefined;
  }

  private async run(key: string, task: Task): Promise<void> {
    try {
      await task();
      this.counters.succeeded++;
    } catch (error) {
      this.counters.failed++;
      this.lastError = errorMessage(error);
      this.options.onError?.(key, error);
    } finally {
      this.running.delete(key);
      this.pump();
      this.notifyIdle();
    }
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    for (const wake of this.idleWaiters.splice(0)) {
      wake();
    }
  }
}
