/**
 * In-process lock table keyed by string. A holder of several keys takes
 * them in sorted order, so two writers asking for overlapping sets cannot
 * deadlock each other.
 */
export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  async acquire(keys: Iterable<string>): Promise<() => void> {
    const ordered = Array.from(new Set(keys)).sort();
    const releases: Array<() => void> = [];
    for (const key of ordered) releases.push(await this.acquireOne(key));
    let released = false;
    return () => {
      if (released) return;
      released = true;
      for (const release of releases.reverse()) release();
    };
  }

  async runExclusive<T>(keys: Iterable<string>, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(keys);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private async acquireOne(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let open: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => { open = resolve; });
    const tail = previous.then(() => gate);
    this.tails.set(key, tail);
    await previous;
    return () => {
      open();
      // Last waiter out clears the slot
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };
  }
}

export type Timed<T> = { timedOut: false; value: T } | { timedOut: true };

/**
 * Races `work` against a timer. A late rejection of `work` is handed to
 * `onLateError` instead of surfacing as an unhandled rejection.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  ms: number,
  onLateError?: (error: unknown) => void,
): Promise<Timed<T>> {
  if (ms <= 0) {
    work.catch((error: unknown) => onLateError?.(error));
    return { timedOut: true };
  }
  let timer: NodeJS.Timeout | undefined;
  let expired = false;
  const timeout = new Promise<Timed<T>>((resolve) => {
    timer = setTimeout(() => {
      expired = true;
      resolve({ timedOut: true });
    }, ms);
  });
  const guarded = work.then(
    (value): Timed<T> => ({ timedOut: false, value }),
    (error: unknown): Timed<T> => {
      if (expired) {
        onLateError?.(error);
        return { timedOut: true };
      }
      throw error;
    },
  );
  try {
    return await Promise.race([guarded, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
