// guard/pgStore.ts
// Avoid list backed by the avoid_list_entries table

import { transaction } from "../db";
import type { SqlClient, TransactionRunner } from "../db";
import { rowToEntry } from "../helpers";
import type { AvoidListRow } from "../helpers";
import { ConfigurationError, GuardError, StoreUnavailableError, describeError } from "./errors";
import type { AvoidListEntry, HistorySession, HistoryStore, RecipeFingerprint } from "./types";

/**
 * Every call runs in its own transaction. `withKey` takes a transaction-scoped
 * advisory lock on the key first, so concurrent admissions for one key see each
 * other's writes while different keys never wait on each other.
 */
export class PgHistoryStore implements HistoryStore {
  constructor(
    private readonly perComboCap: number,
    private readonly runTransaction: TransactionRunner = transaction,
  ) {
    if (!Number.isInteger(perComboCap) || perComboCap < 1) {
      throw new ConfigurationError("perComboCap", `must be an integer >= 1 (got ${perComboCap})`);
    }
  }

  getActive(key: string, windowStart: Date): Promise<AvoidListEntry[]> {
    return this.withKey(key, (session) => session.getActive(key, windowStart));
  }

  append(key: string, fingerprint: RecipeFingerprint, timestamp: Date): Promise<void> {
    return this.withKey(key, (session) => session.append(key, fingerprint, timestamp));
  }

  async withKey<T>(key: string, fn: (session: HistorySession) => Promise<T>): Promise<T> {
    const callback = { failed: false };
    try {
      return await this.runTransaction(async (client) => {
        await client.query("SELECT pg_advisory_xact_lock(hashtext($1))", [key]);
        try {
          return await fn(this.session(client));
        } catch (err) {
          callback.failed = true;
          throw err;
        }
      });
    } catch (err) {
      if (callback.failed || err instanceof GuardError) throw err;
      throw new StoreUnavailableError(`Avoid list unavailable for ${key}: ${describeError(err)}`, { cause: err });
    }
  }

  async evictExpired(before: Date): Promise<number> {
    try {
      return await this.runTransaction(async (client) => {
        const rows = await client.query<{ id: string }>(
          "DELETE FROM avoid_list_entries WHERE created_at < $1 RETURNING id",
          [before],
        );
        return rows.length;
      });
    } catch (err) {
      throw new StoreUnavailableError(`Avoid list eviction failed: ${describeError(err)}`, { cause: err });
    }
  }

  private session(client: SqlClient): HistorySession {
    const cap = this.perComboCap;

    return {
      async getActive(key, windowStart) {
        try {
          const rows = await client.query<AvoidListRow>(
            `SELECT id, history_key, fingerprint, created_at
             FROM avoid_list_entries
             WHERE history_key = $1 AND created_at >= $2
             ORDER BY created_at ASC, id ASC`,
            [key, windowStart],
          );
          return rows.map(rowToEntry);
        } catch (err) {
          throw new StoreUnavailableError(`Avoid list read failed for ${key}: ${describeError(err)}`, { cause: err });
        }
      },

      async append(key, fingerprint, timestamp) {
        try {
          await client.query(
            `INSERT INTO avoid_list_entries (history_key, fingerprint, created_at)
             VALUES ($1, $2::jsonb, GREATEST($3::timestamptz, COALESCE(
               (SELECT MAX(created_at) FROM avoid_list_entries WHERE history_key = $1),
               $3::timestamptz
             )))`,
            [key, JSON.stringify(fingerprint), timestamp],
          );
          await client.query(
            `DELETE FROM avoid_list_entries
             WHERE id IN (
               SELECT id FROM avoid_list_entries
               WHERE history_key = $1
               ORDER BY created_at DESC, id DESC
               OFFSET $2
             )`,
            [key, cap],
          );
        } catch (err) {
          throw new StoreUnavailableError(`Avoid list write failed for ${key}: ${describeError(err)}`, { cause: err });
        }
      },
    };
  }
}
