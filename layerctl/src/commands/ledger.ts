import { loadConfig } from "../config/loader.js";
import { createBackends, type Backends } from "../core/backends.js";
import { ConfigError, PipelineError } from "../core/errors.js";
import { LedgerClient } from "../ledger/ledger-client.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type LedgerCheckResult =
  | { ok: true; exists: boolean; exitCode: ExitCode }
  | { ok: false; error: string; exitCode: ExitCode };

/** Ask the ledger whether a package was already built with a given requirements hash. */
export async function ledgerCheck(
  opts: { package: string; fingerprint: string; configDir?: string; env?: string },
  overrides: { backends?: Backends; processEnv?: NodeJS.ProcessEnv } = {},
): Promise<LedgerCheckResult> {
  try {
    const config = await loadConfig(opts.env, opts.configDir, overrides.processEnv);
    const backends = overrides.backends ?? createBackends(config);
    const exists = await new LedgerClient(backends.ledgerStore).exists(opts.package, opts.fingerprint);
    return { ok: true, exists, exitCode: exists ? EXIT.SUCCESS : EXIT.NOT_RECORDED };
  } catch (e) {
    if (e instanceof ConfigError) {
      return { ok: false, error: e.message, exitCode: EXIT.INVALID_ARGS };
    }
    if (e instanceof PipelineError) {
      return { ok: false, error: e.message, exitCode: EXIT.BUILD_FAILED };
    }
    throw e;
  }
}
