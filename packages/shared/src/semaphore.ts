export interface Semaphore {
  acquire(): Promise<void>;
  release(): void;
}

export function createSemaphore(limit: number): Semaphore {
  let running = 0;
  const waiting: Array<() => void> = [];

  return {
    async acquire(): Promise<void> {
      if (running < limit) {
        running++;
        return;
      }
      return new Promise<void>((resolve) => {
        waiting.push(resolve);
      });
    },

    release(): void {
      running--;
      const next = waiting.shift();
      if (next) {
        running++;
        next();
      }
    }
  };
}

export async function withPermit<T>(semaphore: Semaphore, work: () => Promise<T>): Promise<T> {
  await semaphore.acquire();
  try {
    return await work();
  } finally {
    semaphore.release();
  }
}
