const settle = (): void => undefined;

/**
 * Serializes async tasks per key. Tasks for different keys run independently.
 */
export class BucketLock {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail: Promise<void> = result.then(settle, settle).then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    this.tails.set(key, tail);
    return result;
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
