import { ModelNotReadyError } from '@transit-pulse/domain';
import type {
  ModelLoadState,
  ModelSourcePort,
  ModelStatus,
  PositionInferencePort,
} from '@transit-pulse/domain';

const NOT_STARTED_MESSAGE = 'Model loading has not started. Retry shortly.';
const LOADING_MESSAGE = 'Model is loading. Retry shortly.';

/**
 * Owns the correction model's lifecycle.
 *
 *   not_started ──start()──▶ loading ──▶ ready | error
 *        ▲                                  │
 *        └────────────reset()───────────────┘
 *
 * `start()` returns immediately; the load runs as a detached task and is
 * kept in `task` so shutdown and tests can await it. Status reads never wait.
 */
export class ModelLoader {
  private state: ModelLoadState = 'not_started';
  private model: PositionInferencePort | null = null;
  private failure: string | null = null;
  private task: Promise<void> | null = null;
  private attempts = 0;

  constructor(private readonly source: ModelSourcePort) {}

  /** No-op unless not_started. */
  start(): void {
    if (this.state !== 'not_started') return;
    this.state = 'loading';
    this.attempts += 1;
    console.log(`[model-loader] loading correction model (attempt ${this.attempts})`);
    this.task = this.load();
  }

  /** Back to not_started from ready or error; ignored while loading. */
  reset(): boolean {
    if (this.state === 'loading') return false;
    this.state = 'not_started';
    this.model = null;
    this.failure = null;
    this.task = null;
    return true;
  }

  reload(): ModelStatus {
    this.reset();
    this.start();
    return this.getStatus();
  }

  getState(): ModelLoadState {
    return this.state;
  }

  getStatus(): ModelStatus {
    switch (this.state) {
      case 'ready':
        return { status: 'ready' };
      case 'error':
        return { status: 'error', message: this.failure ?? 'Model failed to load' };
      case 'loading':
        return { status: 'loading', message: LOADING_MESSAGE };
      case 'not_started':
        return { status: 'not_started', message: NOT_STARTED_MESSAGE };
    }
  }

  /**
   * The ready model, or the error describing why there is none. An idle
   * loader is started here, so a reset never leaves it waiting for a reload.
   */
  acquire(): PositionInferencePort | ModelNotReadyError {
    if (this.state === 'ready' && this.model) return this.model;
    if (this.state === 'not_started') this.start();
    const status = this.getStatus();
    if (status.status === 'ready') {
      return new ModelNotReadyError('loading', LOADING_MESSAGE);
    }
    return new ModelNotReadyError(status.status, status.message);
  }

  get loadAttempts(): number {
    return this.attempts;
  }

  get modelName(): string | null {
    return this.model?.modelName ?? null;
  }

  /** Resolves once the current load (if any) has settled. */
  async settled(): Promise<void> {
    if (this.task) await this.task;
  }

  private async load(): Promise<void> {
    try {
      const model = await this.source.load();
      this.model = model;
      this.state = 'ready';
      console.log(`[model-loader] model ${model.modelName} ready`);
    } catch (err) {
      this.failure = `Model failed to load: ${err instanceof Error ? err.message : String(err)}`;
      this.state = 'error';
      console.error('[model-loader] load failed', err);
    }
  }
}
