import { errorMessage, type Logger } from "@hedgegrid/core";

export type QueueTask = () => void | Promise<void>;

/**
 * Runs tasks one at a time in push order. A failing task is logged and does not
 * stop the tasks behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(
    private readonly name: string,
    private readonly log: Logger
  ) {}

  push(task: QueueTask, label = "task"): Promise<void> {
    this.pending += 1;
    const run = this.tail.then(async () => {
      try {
        await task();
      } catch (error) {
        this.log.error({ err: errorMessage(error), queue: this.name, task: label }, "queued task failed");
      } finally {
        this.pending -= 1;
      }
    });
    this.tail = run;
    return run;
  }

  size(): number {
    return this.pending;
  }

  /** Resolves once the queue is drained, including tasks pushed while waiting. */
  async idle(): Promise<void> {
    for (;;) {
      const current = this.tail;
      await current;
      if (current === this.tail) return;
    }
  }
}
