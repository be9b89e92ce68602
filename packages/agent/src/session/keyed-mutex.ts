import { createSemaphore, withPermit } from "@farmdesk/shared";
import type { Semaphore } from "@farmdesk/shared";

type Entry = { semaphore: Semaphore; holders: number };

export class KeyedMutex {
  private readonly entries = new Map<string, Entry>();

  async run<T>(key: string, work: () => Promise<T>): Promise<T> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { semaphore: createSemaphore(1), holders: 0 };
      this.entries.set(key, entry);
    }
    entry.holders++;
    try {
      return await withPermit(entry.semaphore, work);
    } finally {
      entry.holders--;
      if (entry.holders === 0) this.entries.delete(key);
    }
  }
}
