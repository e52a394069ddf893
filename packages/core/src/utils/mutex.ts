/**
 * Promise-chained mutual exclusion.
 *
 * Callers queue behind the previous holder; a rejected holder releases the
 * lock the same way a resolved one does.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => this.release(),
      () => this.release()
    );
    return run;
  }

  /** True while a holder is running or waiting */
  get locked(): boolean {
    return this.pending > 0;
  }

  private release(): void {
    this.pending--;
  }
}
