import { PipelineError, errorMessage } from "../core/errors.js";
import { diag, silentReporter, type Reporter } from "../log/reporter.js";
import type { LedgerRecord } from "../types/build.js";
import type { InsertOutcome, LedgerStore } from "./ledger-store.js";

export type LedgerClientOptions = {
  reporter?: Reporter;
  now?: () => Date;
};

/**
 * Existence checks and inserts against the fingerprint ledger. Store
 * failures are fatal to the run; a duplicate insert from a racing build is not.
 */
export class LedgerClient {
  private readonly reporter: Reporter;
  private readonly now: () => Date;

  constructor(
    private readonly store: LedgerStore,
    opts: LedgerClientOptions = {},
  ) {
    this.reporter = opts.reporter ?? silentReporter;
    this.now = opts.now ?? (() => new Date());
  }

  async exists(pkg: string, fingerprint: string): Promise<boolean> {
    let matches: number;
    try {
      matches = await this.store.count(pkg, fingerprint);
    } catch (e) {
      throw new PipelineError("LEDGER_QUERY_FAILED", `Ledger query failed for ${pkg}: ${errorMessage(e)}`, {
        cause: e,
        details: { package: pkg, requirements_hash: fingerprint },
      });
    }
    return matches > 0;
  }

  async record(pkg: string, version: string, manifestText: string, fingerprint: string): Promise<LedgerRecord> {
    const record: LedgerRecord = {
      package: pkg,
      version,
      requirements: manifestText,
      requirements_hash: fingerprint,
      created_date: this.now().toISOString(),
    };

    let outcome: InsertOutcome;
    try {
      outcome = await this.store.insert(record);
    } catch (e) {
      throw new PipelineError("LEDGER_WRITE_FAILED", `Ledger write failed for ${pkg}==${version}: ${errorMessage(e)}`, {
        cause: e,
        details: { package: pkg, version, requirements_hash: fingerprint },
      });
    }

    if (outcome === "duplicate") {
      this.reporter(
        diag("warn", "LEDGER_DUPLICATE", `${pkg} hash ${fingerprint} was already recorded by another build`, {
          details: { package: pkg, version, requirements_hash: fingerprint },
        }),
      );
    } else {
      this.reporter(
        diag("info", "LEDGER_RECORDED", `Recorded ${pkg}==${version} with hash ${fingerprint}`, {
          details: { package: pkg, version, requirements_hash: fingerprint },
        }),
      );
    }
    return record;
  }
}
