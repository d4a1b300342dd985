/**
 * Runs tasks one at a time in submission order. A failed task does not
 * poison the queue; its rejection goes to its own caller only.
 */
export class SerialQueue {
  private sequence: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T> | T): Promise<T> {
    const next = this.sequence.then(task, task);
    this.sequence = next.then(
      () => undefined,
      () => undefined,
    );

    return next;
  }
}
