/**
 * Promise-chained mutual exclusion. Tasks run one at a time in the order
 * they asked for the lock; a failing task releases it for the next.
 */
export type Mutex = Readonly<{
  runExclusive: <T>(task: () => T | Promise<T>) => Promise<T>;
  /** Number of tasks holding or waiting for the lock. */
  pending: () => number;
}>;

export function makeMutex(): Mutex {
  let tail: Promise<void> = Promise.resolve();
  let waiting = 0;

  function runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    waiting++;
    const run = tail.then(task);
    tail = run.then(
      () => {
        waiting--;
      },
      () => {
        waiting--;
      },
    );
    return run;
  }

  return { runExclusive, pending: () => waiting };
}
