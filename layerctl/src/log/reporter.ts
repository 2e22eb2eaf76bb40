import type { Diagnostic } from "../types/diagnostic.js";

/** Sink for diagnostics emitted while a build runs. */
export type Reporter = (d: Diagnostic) => void;

export type OutputFormat = "human" | "jsonl";

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

/** One JSON object per line. */
export function jsonlReporter(out: NodeJS.WritableStream = process.stdout): Reporter {
  return (d) => {
    out.write(JSON.stringify(d) + "\n");
  };
}

/** `[level] CODE message` lines on stderr, leaving stdout for the result. */
export function humanReporter(out: NodeJS.WritableStream = process.stderr): Reporter {
  return (d) => {
    out.write(`[${d.level}] ${d.code} ${d.message}\n`);
  };
}

export function reporterFor(format: OutputFormat): Reporter {
  return format === "jsonl" ? jsonlReporter() : humanReporter();
}

export const silentReporter: Reporter = () => {};
