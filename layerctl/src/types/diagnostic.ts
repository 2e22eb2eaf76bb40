export type DiagnosticLevel = "error" | "warn" | "info";

export type Diagnostic = {
  level: DiagnosticLevel;
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};
