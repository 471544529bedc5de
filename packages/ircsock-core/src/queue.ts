// Per-connection sequential task queue.
//
// Every transport callback for a connection runs through one of these, so
// the read buffer and the pending-write flag are only ever touched by one
// task at a time.

/**
 * FIFO task queue drained on the microtask queue.
 *
 * Created when a connection opens and closed on reset. Tasks dispatched
 * after `close()` are dropped.
 */
export class SerialQueue {
  private tasks: Array<() => void> = [];
  private scheduled = false;
  private _closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(readonly label: string) {}

  get closed(): boolean {
    return this._closed;
  }

  /** Number of tasks waiting to run. */
  get pending(): number {
    return this.tasks.length;
  }

  dispatch(task: () => void): void {
    if (this._closed) return;
    this.tasks.push(task);
    this.schedule();
  }

  /** Drop pending tasks and refuse new ones. */
  close(): void {
    this._closed = true;
    this.tasks = [];
    this.notifyIdle();
  }

  /** Resolves once every task dispatched so far has run. */
  idle(): Promise<void> {
    if (this.tasks.length === 0 && !this.scheduled) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    queueMicrotask(() => this.drain());
  }

  private drain(): void {
    this.scheduled = false;
    while (!this._closed) {
      const task = this.tasks.shift();
      if (task === undefined) break;
      try {
        task();
      } catch (error) {
        // Keep the remaining tasks moving, then surface the failure.
        if (this.tasks.length > 0) this.schedule();
        else this.notifyIdle();
        throw error;
      }
    }
    if (!this.scheduled) this.notifyIdle();
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
