export type SyncTask = () => Promise<unknown>;

export interface SyncFailure {
  label: string;
  error: Error;
  failedAt: Date;
}

export interface SyncQueueOptions {
  onError?: (failure: SyncFailure) => void;
  /** Failures kept in `failures`, oldest dropped first. */
  maxRecordedFailures?: number;
}

interface QueuedTask {
  label: string;
  task: SyncTask;
}

/**
 * SyncQueue - Runs remote mirroring tasks one at a time in enqueue order
 *
 * Callers enqueue and move on. A task that throws is logged and recorded;
 * it is not retried and does not stop the tasks behind it.
 */
export class SyncQueue {
  private queue: QueuedTask[] = [];
  private running: Promise<void> | null = null;
  private closed = false;
  private recorded: SyncFailure[] = [];
  private onError?: (failure: SyncFailure) => void;
  private maxRecordedFailures: number;

  constructor(options: SyncQueueOptions = {}) {
    this.onError = options.onError;
    this.maxRecordedFailures = options.maxRecordedFailures ?? 100;
  }

  get pending(): number {
    return this.queue.length;
  }

  get isIdle(): boolean {
    return this.running === null && this.queue.length === 0;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get failures(): readonly SyncFailure[] {
    return this.recorded;
  }

  /** Returns false when the queue has been shut down and the task was dropped. */
  enqueue(label: string, task: SyncTask): boolean {
    if (this.closed) {
      console.warn(`[SyncQueue] Dropping "${label}": queue is shut down`);
      return false;
    }

    this.queue.push({ label, task });
    if (this.running === null) {
      this.running = this.work();
    }
    return true;
  }

  /** Resolves once every task enqueued so far, and any enqueued meanwhile, has settled. */
  async drain(): Promise<void> {
    while (this.running !== null) {
      await this.running;
    }
  }

  /** Stops accepting tasks and waits for the queued ones to finish. */
  async shutdown(): Promise<void> {
    this.closed = true;
    await this.drain();
  }

  private async work(): Promise<void> {
    let next = this.queue.shift();
    while (next) {
      try {
        await next.task();
      } catch (err) {
        this.record(next.label, err);
      }
      next = this.queue.shift();
    }
    this.running = null;
  }

  private record(label: string, err: unknown): void {
    const failure: SyncFailure = {
      label,
      error: err instanceof Error ? err : new Error(String(err)),
      failedAt: new Date(),
    };

    console.error(`[SyncQueue] Task "${label}" failed: ${failure.error.message}`);

    this.recorded.push(failure);
    if (this.recorded.length > this.maxRecordedFailures) {
      this.recorded.shift();
    }

    if (this.onError) {
      try {
        this.onError(failure);
      } catch (listenerError) {
        console.error('[SyncQueue] onError listener threw:', listenerError);
      }
    }
  }
}
