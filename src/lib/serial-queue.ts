/**
 * Serial Queue
 *
 * Runs async work one unit at a time in submission order.
 * A failed unit rejects its own caller and does not stall the queue.
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Number of units queued or running.
   */
  get size(): number {
    return this.pending;
  }

  /**
   * True when a unit is queued or running.
   */
  get busy(): boolean {
    return this.pending > 0;
  }

  /**
   * Enqueue a unit of work.
   *
   * @returns Promise settling with the unit's own result
   */
  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  /**
   * Resolves once everything queued so far has settled.
   */
  async drain(): Promise<void> {
    await this.tail;
  }

  private settle(): void {
    this.pending--;
  }
}
