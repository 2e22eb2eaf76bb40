import fs from "node:fs";
import path from "node:path";
import type { LedgerRecord } from "../types/build.js";
import type { InsertOutcome, LedgerStore } from "./ledger-store.js";

type Row = Record<string, unknown>;

/**
 * Ledger kept as JSON lines in `<rootDir>/<table>.jsonl`, for local builds.
 * Rows are only ever appended. The key check and the append in `insert` run
 * without yielding, so inserts from one process cannot both append a key.
 */
export class FileLedgerStore implements LedgerStore {
  private readonly filePath: string;

  constructor(rootDir: string, table: string) {
    this.filePath = path.join(path.resolve(rootDir), `${table}.jsonl`);
  }

  getFilePath(): string {
    return this.filePath;
  }

  async count(pkg: string, fingerprint: string): Promise<number> {
    return this.countSync(pkg, fingerprint);
  }

  async insert(record: LedgerRecord): Promise<InsertOutcome> {
    if (this.countSync(record.package, record.requirements_hash) > 0) return "duplicate";

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.appendFileSync(this.filePath, JSON.stringify(record) + "\n", "utf8");
    return "inserted";
  }

  private countSync(pkg: string, fingerprint: string): number {
    return this.readRows().filter((r) => r.package === pkg && r.requirements_hash === fingerprint).length;
  }

  private readRows(): Row[] {
    if (!fs.existsSync(this.filePath)) return [];
    const rows: Row[] = [];
    const lines = fs.readFileSync(this.filePath, "utf8").split("\n");
    for (const [idx, line] of lines.entries()) {
      if (!line.trim()) continue;
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new Error(`Malformed ledger row at ${this.filePath}:${idx + 1}`);
      }
      rows.push({ ...parsed });
    }
    return rows;
  }
}
