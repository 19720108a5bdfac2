/** Read side of the completion counter, handed to observers. */
export interface CompletionView {
  readonly completed: number;
  readonly total: number;
  isDone(): boolean;
}

/**
 * Shared count of finished tasks. Producers only call `increment`; the
 * event loop serialises those calls, so no further locking is needed.
 */
export class CompletionCounter implements CompletionView {
  readonly total: number;
  private count = 0;

  constructor(total: number) {
    this.total = total;
  }

  get completed(): number {
    return this.count;
  }

  /** Record one finished task and return the new count. */
  increment(): number {
    if (this.count >= this.total) {
      throw new RangeError(`Completion counter overflow: ${this.count + 1}/${this.total}`);
    }
    this.count += 1;
    return this.count;
  }

  isDone(): boolean {
    return this.count >= this.total;
  }
}
