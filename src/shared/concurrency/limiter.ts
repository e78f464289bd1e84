export type Limiter = {
  <T>(task: () => Promise<T>): Promise<T>;
  activeCount: () => number;
  pendingCount: () => number;
};

/**
 * Runs at most `concurrency` tasks at once; the rest wait in FIFO order.
 * The renderer uses it so that only a bounded number of browsers are alive.
 */
export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const start = queue.shift();
    if (!start) return;
    active += 1;
    start();
  };

  const run = <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(() => {
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            active -= 1;
            next();
          });
      });
      next();
    });

  return Object.assign(run, {
    activeCount: () => active,
    pendingCount: () => queue.length
  });
};
