import fs from "node:fs";
import path from "node:path";
import type { ArtifactPublisher } from "../artifact/publisher.js";
import { DEFAULT_ARCHIVE_EXTENSION, archiveTree } from "../artifact/archiver.js";
import { objectKeyFor } from "../artifact/publisher.js";
import { buildDependencyManifest } from "../fingerprint/manifest.js";
import { dirSize } from "../fs/tree.js";
import { installSpecFor, type Installer } from "../installer/pip.js";
import type { LedgerClient } from "../ledger/ledger-client.js";
import { diag, silentReporter, type Reporter } from "../log/reporter.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type {
  BuildOutcome,
  BuildRequest,
  BuildRequestInput,
  DependencyManifest,
  PipelineResult,
} from "../types/build.js";
import { PipelineError, errorMessage, type PipelineErrorCode } from "./errors.js";
import { nextStage, type BuildStage, type TransitionEvent } from "./state-machine.js";

export const REQUIREMENTS_FILE = "requirements.txt";

export type BuildPipelineDeps = {
  installer: Installer;
  ledger: LedgerClient;
  publisher: ArtifactPublisher;
  registry: SchemaRegistry;
  reporter?: Reporter;
};

export type BuildPipelineOptions = {
  /** Parent of every package's working directory and archive. */
  workRoot: string;
  /** Base name of the installed tree and root entry of the archive. */
  treeDirName?: string;
  archiveExtension?: string;
  /** Install `package==version` instead of the latest release. */
  pinVersion?: boolean;
};

export type BuildReport = {
  result: PipelineResult;
  outcome: BuildOutcome;
  manifest: DependencyManifest;
  treeDir: string;
  archivePath: string;
  stages: BuildStage[];
};

async function guard<T>(code: PipelineErrorCode, fn: () => Promise<T> | T): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof PipelineError) throw e;
    throw new PipelineError(code, errorMessage(e), { cause: e });
  }
}

/**
 * Build pipeline: install, fingerprint, archive, then publish and record
 * unless the ledger already holds the fingerprint.
 *
 * Working paths are keyed by package name: `<workRoot>/<package>/<treeDirName>`
 * and `<workRoot>/<package><ext>`. Two runs for the same package share them.
 */
export class BuildPipeline {
  private readonly installer: Installer;
  private readonly ledger: LedgerClient;
  private readonly publisher: ArtifactPublisher;
  private readonly registry: SchemaRegistry;
  private readonly reporter: Reporter;
  private readonly workRoot: string;
  private readonly treeDirName: string;
  private readonly archiveExtension: string;
  private readonly pinVersion: boolean;

  constructor(deps: BuildPipelineDeps, opts: BuildPipelineOptions) {
    this.installer = deps.installer;
    this.ledger = deps.ledger;
    this.publisher = deps.publisher;
    this.registry = deps.registry;
    this.reporter = deps.reporter ?? silentReporter;
    this.workRoot = path.resolve(opts.workRoot);
    this.treeDirName = opts.treeDirName ?? "python";
    this.archiveExtension = opts.archiveExtension ?? DEFAULT_ARCHIVE_EXTENSION;
    this.pinVersion = opts.pinVersion ?? false;
  }

  /** Run one build and return the invocation output. */
  async run(input: unknown): Promise<PipelineResult> {
    const report = await this.execute(input);
    return report.result;
  }

  /** Run one build and return the output along with what happened. */
  async execute(input: unknown): Promise<BuildReport> {
    let stage: BuildStage = "start";
    const stages: BuildStage[] = [stage];
    const advance = (event: TransitionEvent): void => {
      stage = nextStage(stage, event);
      stages.push(stage);
    };

    try {
      const request = await guard("REQUEST_INVALID", () => this.parseRequest(input));
      const pkg = request.package;
      const key = objectKeyFor(pkg, this.archiveExtension);

      const spec = installSpecFor(request, this.pinVersion);
      const { treeDir, size } = await guard("INSTALL_FAILED", async () => {
        const dir = await this.installer.install(spec, path.join(this.workRoot, pkg, this.treeDirName));
        return { treeDir: dir, size: dirSize(dir) };
      });
      this.reporter(
        diag("info", "BUILD_INSTALLED", `Installed ${pkg} into ${treeDir} with size: ${size}`, {
          path: treeDir,
          details: { bytes: size },
        }),
      );
      advance("success");

      const manifest = await guard("FINGERPRINT_FAILED", () => {
        const m = buildDependencyManifest(treeDir);
        fs.writeFileSync(path.join(treeDir, REQUIREMENTS_FILE), m.text, "utf8");
        return m;
      });
      this.reporter(
        diag("info", "BUILD_MANIFESTED", `Resolved ${manifest.entries.length} requirements for ${pkg}`, {
          details: { requirements_hash: manifest.fingerprint, entries: manifest.entries },
        }),
      );
      advance("success");

      const archivePath = await guard("ARCHIVE_FAILED", () =>
        archiveTree(treeDir, pkg, this.workRoot, this.archiveExtension),
      );
      this.reporter(diag("info", "BUILD_ARCHIVED", `Zipped package into ${archivePath}`, { path: archivePath }));
      advance("success");

      const known = await guard("LEDGER_QUERY_FAILED", () => this.ledger.exists(pkg, manifest.fingerprint));
      let outcome: BuildOutcome;
      if (!known) {
        this.reporter(
          diag(
            "info",
            "BUILD_NEW_HASH",
            `Requirements hash ${manifest.fingerprint} for ${pkg}==${request.version} not previously built, uploading`,
          ),
        );
        await guard("PUBLISH_FAILED", () => this.publisher.publish(archivePath, pkg, key));
        await guard("LEDGER_WRITE_FAILED", () =>
          this.ledger.record(pkg, request.version, manifest.text, manifest.fingerprint),
        );
        advance("fingerprint_new");
        outcome = "published";
        this.reporter(
          diag("info", "BUILD_PUBLISHED", `Built ${pkg}==${request.version} as ${key}`, {
            details: { key, requirements_hash: manifest.fingerprint },
          }),
        );
      } else {
        advance("fingerprint_known");
        outcome = "skipped";
        this.reporter(
          diag("info", "BUILD_SKIPPED", `Requirements hash ${manifest.fingerprint} previously built for ${pkg}`, {
            details: { key, requirements_hash: manifest.fingerprint },
          }),
        );
      }
      advance("success");

      const result: PipelineResult = {
        zip_file: key,
        package: pkg,
        version: request.version,
        requirements_hash: manifest.fingerprint,
        license_info: request.license_info,
      };
      return { result, outcome, manifest, treeDir, archivePath, stages };
    } catch (e) {
      if (e instanceof PipelineError) {
        e.stage ??= stage;
        this.reporter(diag("error", e.code, e.message, { details: { stage: e.stage, ...e.details } }));
      }
      throw e;
    }
  }

  private async parseRequest(input: unknown): Promise<BuildRequest> {
    const res = await this.registry.check<BuildRequestInput>("build-request", input);
    if (!res.valid) {
      throw new PipelineError("REQUEST_INVALID", `Invalid build request: ${res.errors}`);
    }
    return {
      package: res.value.package,
      version: String(res.value.version),
      license_info: res.value.license_info,
    };
  }
}
