// Serial executor for one connection.
//
// Every mutation of a connection's state happens inside a loop task, so
// transport events, execution completions and off-loop writes never
// interleave halfway through each other.

export type LoopErrorHandler = (error: unknown) => void;

/**
 * Runs tasks one at a time, in submission order.
 *
 * `run()` is for transport events: it executes immediately unless a task is
 * already running, in which case it queues behind it. `execute()` always
 * queues, and the queue is drained on a microtask.
 */
export class ConnectionLoop {
  private queue: Array<() => void> = [];
  private running = false;
  private scheduled = false;

  /**
   * @param onError receives anything a task throws; the loop keeps draining
   */
  constructor(private onError: LoopErrorHandler) {}

  /** True while a task is executing. */
  get inLoop(): boolean {
    return this.running;
  }

  /** Number of tasks waiting to run. */
  get pending(): number {
    return this.queue.length;
  }

  run(task: () => void): void {
    if (this.running) {
      this.queue.push(task);
      return;
    }
    this.drain(task);
  }

  execute(task: () => void): void {
    this.queue.push(task);
    if (this.running || this.scheduled) return;
    this.scheduled = true;
    queueMicrotask(() => {
      this.scheduled = false;
      if (!this.running) this.drain();
    });
  }

  private drain(first?: () => void): void {
    this.running = true;
    try {
      if (first) this.runTask(first);
      let next = this.queue.shift();
      while (next) {
        this.runTask(next);
        next = this.queue.shift();
      }
    } finally {
      this.running = false;
    }
  }

  private runTask(task: () => void): void {
    try {
      task();
    } catch (error) {
      this.onError(error);
    }
  }
}
