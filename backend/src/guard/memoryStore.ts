// guard/memoryStore.ts
// Process-lifetime avoid list. Lost on restart.

import { KeyedMutex } from "../services/concurrency";
import { ConfigurationError, StoreUnavailableError, describeError } from "./errors";
import type { AvoidListEntry, HistorySession, HistoryStore, RecipeFingerprint } from "./types";

export class InMemoryHistoryStore implements HistoryStore {
  private readonly entries = new Map<string, AvoidListEntry[]>();
  private readonly mutex = new KeyedMutex();
  private seq = 0;

  constructor(private readonly perComboCap: number) {
    if (!Number.isInteger(perComboCap) || perComboCap < 1) {
      throw new ConfigurationError("perComboCap", `must be an integer >= 1 (got ${perComboCap})`);
    }
  }

  async getActive(key: string, windowStart: Date): Promise<AvoidListEntry[]> {
    try {
      const list = this.entries.get(key) ?? [];
      return list
        .filter((e) => e.createdAt.getTime() >= windowStart.getTime())
        .map((e) => ({ ...e, createdAt: new Date(e.createdAt) }));
    } catch (err) {
      throw new StoreUnavailableError(`Avoid list read failed for ${key}: ${describeError(err)}`, { cause: err });
    }
  }

  /** Insert, then drop the oldest entries for the key until it is back at the cap. */
  async append(key: string, fingerprint: RecipeFingerprint, timestamp: Date): Promise<void> {
    try {
      const list = this.entries.get(key) ?? [];
      const newest = list[list.length - 1];
      const createdAt = newest && newest.createdAt > timestamp ? newest.createdAt : timestamp;

      list.push({ key, fingerprint, createdAt: new Date(createdAt), seq: ++this.seq });
      if (list.length > this.perComboCap) {
        list.splice(0, list.length - this.perComboCap);
      }
      this.entries.set(key, list);
    } catch (err) {
      throw new StoreUnavailableError(`Avoid list write failed for ${key}: ${describeError(err)}`, { cause: err });
    }
  }

  withKey<T>(key: string, fn: (session: HistorySession) => Promise<T>): Promise<T> {
    return this.mutex.run(key, () => fn(this));
  }

  async evictExpired(before: Date): Promise<number> {
    let evicted = 0;
    for (const [key, list] of this.entries) {
      const kept = list.filter((e) => e.createdAt.getTime() >= before.getTime());
      evicted += list.length - kept.length;
      if (kept.length === 0) this.entries.delete(key);
      else this.entries.set(key, kept);
    }
    return evicted;
  }

  /** Total entries stored for a key, expired ones included. */
  size(key: string): number {
    return this.entries.get(key)?.length ?? 0;
  }
}
