import type { BuildStage } from "./state-machine.js";

export type PipelineErrorCode =
  | "REQUEST_INVALID"
  | "INSTALL_FAILED"
  | "FINGERPRINT_FAILED"
  | "ARCHIVE_FAILED"
  | "LEDGER_QUERY_FAILED"
  | "PUBLISH_FAILED"
  | "LEDGER_WRITE_FAILED";

/**
 * Fatal failure of one pipeline run. `stage` is the last stage the run
 * completed before the failure; the orchestrator fills it in.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  stage?: BuildStage;
  readonly details?: Record<string, unknown>;

  constructor(
    code: PipelineErrorCode,
    message: string,
    opts?: { cause?: unknown; details?: Record<string, unknown> },
  ) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "PipelineError";
    this.code = code;
    this.details = opts?.details;
  }
}

export class ConfigError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(errors.length > 0 ? `${message}: ${errors.join("; ")}` : message);
    this.name = "ConfigError";
    this.errors = errors;
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
