/**
 * Runs tasks one at a time per key, in submission order, using a promise
 * chain per key. Tasks under different keys run concurrently.
 */
export class KeyedSerializer {
  private readonly chains = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    // The chain itself never rejects; the caller sees the task's outcome via `result`
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.chains.set(key, tail);
    void tail.then(() => {
      if (this.chains.get(key) === tail) this.chains.delete(key);
    });
    return result;
  }

  /** Keys with queued or running work */
  get activeKeys(): number {
    return this.chains.size;
  }
}
