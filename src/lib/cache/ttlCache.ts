import { ReadWriteLock } from "./readWriteLock.js";

export type Clock = () => number;

interface ICacheEntry<T> {
  payload: T;
  fetchedAt: number;
}

export interface ITtlCacheOptions<T> {
  now?: Clock;
  /** Payloads rejected here are treated as missing, even when fresh. */
  isPresent?: (payload: T) => boolean;
}

const systemClock: Clock = () => Date.now();

const isFresh = <T>(
  entry: ICacheEntry<T> | null,
  ttlMs: number,
  now: number,
  isPresent: (payload: T) => boolean,
): entry is ICacheEntry<T> => {
  if (!entry) return false;
  if (!isPresent(entry.payload)) return false;
  return now - entry.fetchedAt < ttlMs;
};

/**
 * Single-slot memoization of an upstream fetch. Callers racing on a cold or
 * expired slot queue behind one writer and re-check before fetching, so only
 * the first of them reaches the network.
 */
export class TtlCache<T> {
  private entry: ICacheEntry<T> | null = null;
  private readonly lock = new ReadWriteLock();
  private readonly now: Clock;
  private readonly isPresent: (payload: T) => boolean;

  constructor(
    private readonly ttlMs: number,
    options: ITtlCacheOptions<T> = {},
  ) {
    this.now = options.now ?? systemClock;
    this.isPresent = options.isPresent ?? (() => true);
  }

  async getOrFetch(fetchFn: () => Promise<T>): Promise<T> {
    const cached = await this.lock.withRead(() => this.freshPayload());
    if (cached.hit) {
      return cached.payload;
    }

    return this.lock.withWrite(async () => {
      // Another caller may have refreshed the slot while this one waited.
      const rechecked = this.freshPayload();
      if (rechecked.hit) {
        return rechecked.payload;
      }

      const payload = await fetchFn();
      this.entry = { payload, fetchedAt: this.now() };
      return payload;
    });
  }

  /** Last stored payload, fresh or not. */
  peek(): T | null {
    return this.entry ? this.entry.payload : null;
  }

  private freshPayload(): { hit: true; payload: T } | { hit: false } {
    const entry = this.entry;
    if (isFresh(entry, this.ttlMs, this.now(), this.isPresent)) {
      return { hit: true, payload: entry.payload };
    }
    return { hit: false };
  }
}

/**
 * Per-key variant of {@link TtlCache}. Each key has its own entry and lock;
 * entries are never evicted, only replaced once stale.
 */
export class KeyedTtlCache<T> {
  private readonly entries = new Map<string, ICacheEntry<T>>();
  private readonly locks = new Map<string, ReadWriteLock>();
  private readonly now: Clock;
  private readonly isPresent: (payload: T) => boolean;

  constructor(
    private readonly ttlMs: number,
    options: ITtlCacheOptions<T> = {},
  ) {
    this.now = options.now ?? systemClock;
    this.isPresent = options.isPresent ?? (() => true);
  }

  async getOrFetch(key: string, fetchFn: () => Promise<T>): Promise<T> {
    const lock = this.lockFor(key);

    const cached = await lock.withRead(() => this.freshPayload(key));
    if (cached.hit) {
      return cached.payload;
    }

    return lock.withWrite(async () => {
      const rechecked = this.freshPayload(key);
      if (rechecked.hit) {
        return rechecked.payload;
      }

      const payload = await fetchFn();
      this.entries.set(key, { payload, fetchedAt: this.now() });
      return payload;
    });
  }

  peek(key: string): T | null {
    const entry = this.entries.get(key);
    return entry ? entry.payload : null;
  }

  private lockFor(key: string): ReadWriteLock {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new ReadWriteLock();
      this.locks.set(key, lock);
    }
    return lock;
  }

  private freshPayload(key: string): { hit: true; payload: T } | { hit: false } {
    const entry = this.entries.get(key) ?? null;
    if (isFresh(entry, this.ttlMs, this.now(), this.isPresent)) {
      return { hit: true, payload: entry.payload };
    }
    return { hit: false };
  }
}
