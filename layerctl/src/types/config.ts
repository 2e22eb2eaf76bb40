/** Layered configuration types. */
export type StorageBackend = "s3" | "file";
export type LedgerBackend = "dynamodb" | "file";

export type InstallerConfig = {
  command: string;
  pin_version: boolean;
  extra_args: string[];
};

export type StorageConfig = {
  backend: StorageBackend;
  /** Bucket name. With the file backend, the subdirectory under root_dir. */
  bucket: string;
  region?: string;
  endpoint?: string;
  root_dir?: string;
};

export type LedgerConfig = {
  backend: LedgerBackend;
  table: string;
  region?: string;
  endpoint?: string;
  root_dir?: string;
};

export type LayerConfig = {
  schema_version: string;
  work_root: string;
  tree_dir_name: string;
  archive_extension: string;
  installer: InstallerConfig;
  storage: StorageConfig;
  ledger: LedgerConfig;
};
