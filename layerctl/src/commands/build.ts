import fs from "node:fs";
import { loadConfig } from "../config/loader.js";
import { createPipeline, type PipelineOverrides } from "../core/backends.js";
import { ConfigError, PipelineError, errorMessage } from "../core/errors.js";
import type { BuildOutcome, PipelineResult } from "../types/build.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type BuildOpts = {
  package?: string;
  version?: string;
  licenseInfo?: string;
  /** Path to a JSON invocation record; replaces the three fields above. */
  event?: string;
  configDir?: string;
  env?: string;
};

export type BuildCommandResult =
  | { ok: true; result: PipelineResult; outcome: BuildOutcome }
  | { ok: false; error: { code: string; message: string }; exitCode: ExitCode };

type InputResult = { ok: true; input: unknown } | { ok: false; message: string };

function readInput(opts: BuildOpts): InputResult {
  if (opts.event) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(opts.event, "utf8"));
      return { ok: true, input: parsed };
    } catch (e) {
      return { ok: false, message: `Failed to read event file ${opts.event}: ${errorMessage(e)}` };
    }
  }
  if (!opts.package || opts.version === undefined) {
    return { ok: false, message: "A package and --version are required unless --event is given" };
  }
  return {
    ok: true,
    input: { package: opts.package, version: opts.version, license_info: opts.licenseInfo ?? null },
  };
}

function exitCodeFor(e: PipelineError): ExitCode {
  if (e.code === "LEDGER_WRITE_FAILED") return EXIT.LEDGER_INCONSISTENT;
  if (e.code === "REQUEST_INVALID") return EXIT.INVALID_ARGS;
  return EXIT.BUILD_FAILED;
}

export async function build(
  opts: BuildOpts,
  overrides: PipelineOverrides & { processEnv?: NodeJS.ProcessEnv } = {},
): Promise<BuildCommandResult> {
  const input = readInput(opts);
  if (!input.ok) {
    return { ok: false, error: { code: "INPUT_INVALID", message: input.message }, exitCode: EXIT.INVALID_ARGS };
  }

  try {
    const config = await loadConfig(opts.env, opts.configDir, overrides.processEnv);
    const pipeline = await createPipeline(config, overrides);
    const report = await pipeline.execute(input.input);
    return { ok: true, result: report.result, outcome: report.outcome };
  } catch (e) {
    if (e instanceof ConfigError) {
      return { ok: false, error: { code: "CONFIG_INVALID", message: e.message }, exitCode: EXIT.INVALID_ARGS };
    }
    if (e instanceof PipelineError) {
      return { ok: false, error: { code: e.code, message: e.message }, exitCode: exitCodeFor(e) };
    }
    throw e;
  }
}
