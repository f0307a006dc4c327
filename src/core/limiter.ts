// core/limiter.ts
// Bound the number of concurrently running async tasks

export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Create a limiter allowing at most `slots` tasks in flight. Tasks queue in
 * call order and start as earlier ones settle.
 */
export function createLimiter(slots: number): Limiter {
  const capacity = Number.isFinite(slots) ? Math.max(1, Math.floor(slots)) : 1;
  const queue: Array<() => void> = [];
  let active = 0;

  const release = (): void => {
    active--;
    const next = queue.shift();
    if (next) next();
  };

  return <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      const start = (): void => {
        active++;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(release);
      };

      if (active < capacity) {
        start();
      } else {
        queue.push(start);
      }
    });
}
