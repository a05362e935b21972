export interface IntervalLoopOptions {
  name: string;
  /** Delay between the end of one iteration and the start of the next. */
  intervalMs: number;
  /** Delay after a failed iteration. */
  backoffMs: number;
  task: () => Promise<unknown>;
}

export interface IntervalLoopStats {
  name: string;
  active: boolean;
  iterations: number;
  failures: number;
  lastRunAt: number | null;
  lastDurationMs: number | null;
  lastError: string | null;
}

/**
 * Repeats an async task with a fixed delay between iterations. Iterations
 * never overlap; a failing iteration is logged and the next one waits
 * `backoffMs` instead of `intervalMs`.
 */
export class IntervalLoop {
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<void> | null = null;
  private active = false;
  private readonly stats: IntervalLoopStats;

  constructor(private readonly options: IntervalLoopOptions) {
    this.stats = {
      name: options.name,
      active: false,
      iterations: 0,
      failures: 0,
      lastRunAt: null,
      lastDurationMs: null,
      lastError: null,
    };
  }

  /** First iteration runs on the next tick. */
  start(): void {
    if (this.active) return;
    this.active = true;
    this.stats.active = true;
    console.log(`[${this.options.name}] started (every ${this.options.intervalMs} ms)`);
    this.schedule(0);
  }

  /** Cancels the pending iteration and waits for a running one to finish. */
  async stop(): Promise<void> {
    if (!this.active) return;
    this.active = false;
    this.stats.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.current) await this.current;
    console.log(`[${this.options.name}] stopped`);
  }

  isActive(): boolean {
    return this.active;
  }

  getStats(): IntervalLoopStats {
    return { ...this.stats };
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.current = this.iterate();
    }, delayMs);
  }

  private async iterate(): Promise<void> {
    const startedAt = Date.now();
    let nextDelay = this.options.intervalMs;
    try {
      await this.options.task();
      this.stats.lastError = null;
    } catch (err) {
      this.stats.failures += 1;
      this.stats.lastError = err instanceof Error ? err.message : String(err);
      nextDelay = this.options.backoffMs;
      console.error(`[${this.options.name}] iteration failed, retrying in ${nextDelay} ms`, err);
    } finally {
      this.stats.iterations += 1;
      this.stats.lastRunAt = startedAt;
      this.stats.lastDurationMs = Date.now() - startedAt;
      this.current = null;
    }
    if (this.active) this.schedule(nextDelay);
  }
}
