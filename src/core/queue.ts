/**
 * Runs jobs strictly one after another, in submission order. Each caller
 * gets its own job's result or rejection; a failed job does not stop the
 * jobs queued behind it.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private waiting = 0;

  get size(): number {
    return this.waiting;
  }

  run<T>(job: () => T | Promise<T>): Promise<T> {
    this.waiting++;
    const result = this.tail.then(job).finally(() => {
      this.waiting--;
    });
    // The rejection reaches the caller through `result`; the tail only orders jobs.
    this.tail = result.catch(() => undefined);
    return result;
  }
}
