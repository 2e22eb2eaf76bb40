import { loadConfig } from "../config/loader.js";
import { ConfigError } from "../core/errors.js";
import { diag } from "../log/reporter.js";
import type { LayerConfig } from "../types/config.js";
import type { Diagnostic } from "../types/diagnostic.js";

export type ValidateResult = { ok: true; config: LayerConfig } | { ok: false; errors: Diagnostic[] };

/** Load and validate the layered config for an environment. */
export async function validateAll(opts: {
  configDir?: string;
  env?: string;
  processEnv?: NodeJS.ProcessEnv;
}): Promise<ValidateResult> {
  try {
    const config = await loadConfig(opts.env, opts.configDir, opts.processEnv);
    return { ok: true, config };
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    const errors = e.errors.length > 0 ? e.errors : [e.message];
    return {
      ok: false,
      errors: errors.map((message) => diag("error", "CONFIG_INVALID", message, { path: opts.configDir })),
    };
  }
}
