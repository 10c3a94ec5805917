/**
 * Promise-chain mutex. Each `runExclusive` call starts only after every
 * earlier call has settled, in call order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(() => task());
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
