import type { BlobStore } from "../artifact/blob-store.js";
import { FileBlobStore } from "../artifact/file-store.js";
import { ArtifactPublisher } from "../artifact/publisher.js";
import { S3BlobStore } from "../artifact/s3-store.js";
import { PipInstaller, type Installer } from "../installer/pip.js";
import { DynamoLedgerStore } from "../ledger/dynamodb-store.js";
import { FileLedgerStore } from "../ledger/file-store.js";
import { LedgerClient } from "../ledger/ledger-client.js";
import type { LedgerStore } from "../ledger/ledger-store.js";
import { silentReporter, type Reporter } from "../log/reporter.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { LayerConfig } from "../types/config.js";
import { ConfigError } from "./errors.js";
import { BuildPipeline } from "./orchestrator.js";

export type Backends = {
  blobStore: BlobStore;
  ledgerStore: LedgerStore;
};

function requireRootDir(section: string, rootDir: string | undefined): string {
  if (!rootDir) {
    throw new ConfigError(`${section}.root_dir is required for the file backend`);
  }
  return rootDir;
}

/** Construct store clients for the configured backends. */
export function createBackends(config: LayerConfig): Backends {
  const blobStore: BlobStore =
    config.storage.backend === "s3"
      ? S3BlobStore.fromConfig(config.storage)
      : new FileBlobStore(requireRootDir("storage", config.storage.root_dir));

  const ledgerStore: LedgerStore =
    config.ledger.backend === "dynamodb"
      ? DynamoLedgerStore.fromConfig(config.ledger)
      : new FileLedgerStore(requireRootDir("ledger", config.ledger.root_dir), config.ledger.table);

  return { blobStore, ledgerStore };
}

export type PipelineOverrides = {
  backends?: Backends;
  installer?: Installer;
  registry?: SchemaRegistry;
  reporter?: Reporter;
};

/** Wire a BuildPipeline from config; any collaborator can be swapped in. */
export async function createPipeline(config: LayerConfig, overrides: PipelineOverrides = {}): Promise<BuildPipeline> {
  const reporter = overrides.reporter ?? silentReporter;
  const backends = overrides.backends ?? createBackends(config);
  const registry = overrides.registry ?? (await createRegistry());
  const installer =
    overrides.installer ??
    new PipInstaller({ command: config.installer.command, extraArgs: config.installer.extra_args, reporter });

  return new BuildPipeline(
    {
      installer,
      ledger: new LedgerClient(backends.ledgerStore, { reporter }),
      publisher: new ArtifactPublisher({ bucket: config.storage.bucket, store: backends.blobStore, reporter }),
      registry,
      reporter,
    },
    {
      workRoot: config.work_root,
      treeDirName: config.tree_dir_name,
      archiveExtension: config.archive_extension,
      pinVersion: config.installer.pin_version,
    },
  );
}
