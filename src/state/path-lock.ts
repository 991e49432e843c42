/**
 * In-process mutual exclusion keyed by file path.
 *
 * Operations on the same key run one after another in call order; different
 * keys never wait on each other. Nothing here protects against a second
 * process writing the same file.
 */
export class PathLock {
  private static tails = new Map<string, Promise<unknown>>();

  static async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = PathLock.tails.get(key) ?? Promise.resolve();
    // Run after the previous holder whether it resolved or rejected
    const current = previous.then(fn, fn);
    const tail = current.catch(() => undefined);
    PathLock.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (PathLock.tails.get(key) === tail) {
        PathLock.tails.delete(key);
      }
    }
  }
}
