/** Build request, manifest and ledger types for one pipeline run. */

/** Input record of one build. `version` may arrive as a number and is kept as text. */
export type BuildRequestInput = {
  package: string;
  version: string | number;
  license_info: unknown;
};

export type BuildRequest = {
  readonly package: string;
  readonly version: string;
  readonly license_info: unknown;
};

export type DependencyManifest = {
  /** Sorted, deduplicated `name==version` entries. */
  entries: string[];
  /** Entries joined with newlines, trimmed. Written as requirements.txt. */
  text: string;
  /** SHA256 hex of the UTF-8 text. */
  fingerprint: string;
};

/** Ledger row. Field names match the ledger table's attributes. */
export type LedgerRecord = {
  package: string;
  version: string;
  requirements: string;
  requirements_hash: string;
  created_date: string;
};

export type PipelineResult = {
  zip_file: string;
  package: string;
  version: string;
  requirements_hash: string;
  license_info: unknown;
};

export type BuildOutcome = "published" | "skipped";
