import * as path from 'path';

/**
 * DirectoryLock - per-directory critical sections.
 *
 * Tasks for the same directory run one after another in call order;
 * tasks for different directories do not wait on each other.
 */
export class DirectoryLock {
  private tails: Map<string, Promise<void>> = new Map();

  async run<T>(directory: string, task: () => Promise<T>): Promise<T> {
    const key = path.resolve(directory);
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Directories with a task running or queued. */
  activeCount(): number {
    return this.tails.size;
  }
}
