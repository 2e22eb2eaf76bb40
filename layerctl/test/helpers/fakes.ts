import fs from "node:fs";
import type { BlobObject, BlobStore } from "../../src/artifact/blob-store.js";
import type { Installer } from "../../src/installer/pip.js";
import type { InsertOutcome, LedgerStore } from "../../src/ledger/ledger-store.js";
import type { Reporter } from "../../src/log/reporter.js";
import type { LedgerRecord } from "../../src/types/build.js";
import type { Diagnostic } from "../../src/types/diagnostic.js";
import { writeTree } from "./tree.js";

export class InMemoryBlobStore implements BlobStore {
  readonly objects = new Map<string, { body: Uint8Array; last_modified: Date }>();
  readonly puts: Array<{ bucket: string; key: string; bytes: number }> = [];
  failPut: Error | null = null;
  failList: Error | null = null;

  async put(bucket: string, key: string, body: Uint8Array): Promise<void> {
    if (this.failPut) throw this.failPut;
    this.puts.push({ bucket, key, bytes: body.length });
    this.objects.set(`${bucket}/${key}`, { body, last_modified: new Date("2026-01-05T10:00:00.000Z") });
  }

  async list(bucket: string, prefix: string): Promise<BlobObject[]> {
    if (this.failList) throw this.failList;
    const out: BlobObject[] = [];
    for (const [full, obj] of this.objects) {
      const key = full.slice(bucket.length + 1);
      if (full.startsWith(`${bucket}/`) && key.startsWith(prefix)) {
        out.push({ key, size: obj.body.length, last_modified: obj.last_modified });
      }
    }
    return out;
  }
}

export class InMemoryLedgerStore implements LedgerStore {
  readonly records: LedgerRecord[] = [];
  readonly inserts: LedgerRecord[] = [];
  queries = 0;
  failQuery: Error | null = null;
  failInsert: Error | null = null;

  async count(pkg: string, fingerprint: string): Promise<number> {
    this.queries++;
    if (this.failQuery) throw this.failQuery;
    return this.records.filter((r) => r.package === pkg && r.requirements_hash === fingerprint).length;
  }

  async insert(record: LedgerRecord): Promise<InsertOutcome> {
    if (this.failInsert) throw this.failInsert;
    this.inserts.push(record);
    if (this.records.some((r) => r.package === record.package && r.requirements_hash === record.requirements_hash)) {
      return "duplicate";
    }
    this.records.push(record);
    return "inserted";
  }
}

/** Stands in for pip: lays down a fixed tree instead of resolving anything. */
export class FakeInstaller implements Installer {
  readonly calls: Array<{ spec: string; targetDir: string }> = [];

  constructor(
    public layout: Record<string, string>,
    public failWith: Error | null = null,
  ) {}

  async install(spec: string, targetDir: string): Promise<string> {
    this.calls.push({ spec, targetDir });
    if (this.failWith) throw this.failWith;
    fs.rmSync(targetDir, { recursive: true, force: true });
    writeTree(targetDir, this.layout);
    return targetDir;
  }
}

export function collectingReporter(): { reporter: Reporter; diagnostics: Diagnostic[]; codes: () => string[] } {
  const diagnostics: Diagnostic[] = [];
  return {
    reporter: (d) => {
      diagnostics.push(d);
    },
    diagnostics,
    codes: () => diagnostics.map((d) => d.code),
  };
}
