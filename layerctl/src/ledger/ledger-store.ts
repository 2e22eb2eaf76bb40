import type { LedgerRecord } from "../types/build.js";

export type InsertOutcome = "inserted" | "duplicate";

/**
 * Record store keyed by (package, requirements_hash). `count` counts every
 * stored row under the key, whatever else the row holds. `insert` must not
 * overwrite an existing key; it reports "duplicate" instead.
 */
export interface LedgerStore {
  count(pkg: string, fingerprint: string): Promise<number>;
  insert(record: LedgerRecord): Promise<InsertOutcome>;
}
