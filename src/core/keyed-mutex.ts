import { AsyncQueue } from './async-queue';

type Permit = { key: string };

type Slot = {
  permits: AsyncQueue<Permit>;
  holders: number;
};

/**
 * One lock per key. Callers on the same key run one at a time in arrival
 * order; different keys never wait on each other.
 */
export class KeyedMutex {
  private slots = new Map<string, Slot>();

  async runExclusive<R>(key: string, task: () => Promise<R>): Promise<R> {
    const slot = this.slotFor(key);
    slot.holders += 1;
    const permit = await slot.permits.next();
    try {
      return await task();
    } finally {
      slot.holders -= 1;
      if (slot.holders === 0) {
        this.slots.delete(key);
      } else {
        slot.permits.push(permit);
      }
    }
  }

  private slotFor(key: string): Slot {
    const existing = this.slots.get(key);
    if (existing) return existing;
    const permits = new AsyncQueue<Permit>();
    permits.push({ key });
    const slot: Slot = { permits, holders: 0 };
    this.slots.set(key, slot);
    return slot;
  }
}
