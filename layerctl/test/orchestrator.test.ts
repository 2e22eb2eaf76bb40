import { describe, expect, it, beforeAll, beforeEach, afterEach } from "vitest";
import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { strFromU8, unzipSync } from "fflate";
import { ArtifactPublisher } from "../src/artifact/publisher.js";
import { PipelineError } from "../src/core/errors.js";
import { BuildPipeline, REQUIREMENTS_FILE } from "../src/core/orchestrator.js";
import { nextStage } from "../src/core/state-machine.js";
import type { Installer } from "../src/installer/pip.js";
import { LedgerClient } from "../src/ledger/ledger-client.js";
import { createRegistry, type SchemaRegistry } from "../src/schema/registry.js";
import { FakeInstaller, InMemoryBlobStore, InMemoryLedgerStore, collectingReporter } from "./helpers/fakes.js";
import { REQUESTS_LAYOUT } from "./helpers/tree.js";

const REQUESTS_MANIFEST = "requests==2.31.0\nurllib3==2.0.0";
const REQUESTS_HASH = createHash("sha256").update(REQUESTS_MANIFEST, "utf8").digest("hex");

describe("state-machine", () => {
  it("walks the publish branch to done", () => {
    expect(nextStage("start", "success")).toBe("installed");
    expect(nextStage("installed", "success")).toBe("manifested");
    expect(nextStage("manifested", "success")).toBe("archived");
    expect(nextStage("archived", "fingerprint_new")).toBe("published");
    expect(nextStage("published", "success")).toBe("done");
  });

  it("branches to skipped on a known fingerprint", () => {
    expect(nextStage("archived", "fingerprint_known")).toBe("skipped");
    expect(nextStage("skipped", "success")).toBe("done");
  });

  it("rejects events that do not apply", () => {
    expect(() => nextStage("archived", "success")).toThrow("Invalid transition: archived --success-->");
    expect(() => nextStage("installed", "fingerprint_new")).toThrow();
    expect(() => nextStage("done", "success")).toThrow();
  });
});

describe("BuildPipeline", () => {
  let registry: SchemaRegistry;
  let tmpDir: string;
  let blobs: InMemoryBlobStore;
  let ledgerStore: InMemoryLedgerStore;
  let installer: FakeInstaller;

  beforeAll(async () => {
    registry = await createRegistry();
  });

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "layerctl-pipeline-"));
    blobs = new InMemoryBlobStore();
    ledgerStore = new InMemoryLedgerStore();
    installer = new FakeInstaller({ ...REQUESTS_LAYOUT });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function makePipeline(opts: { pinVersion?: boolean } = {}) {
    const { reporter, codes } = collectingReporter();
    const pipeline = new BuildPipeline(
      {
        installer,
        ledger: new LedgerClient(ledgerStore, { reporter }),
        publisher: new ArtifactPublisher({ bucket: "layers", store: blobs, reporter }),
        registry,
        reporter,
      },
      { workRoot: tmpDir, pinVersion: opts.pinVersion },
    );
    return { pipeline, codes };
  }

  const request = { package: "requests", version: "2.31.0", license_info: "MIT" };

  it("publishes and records a new fingerprint", async () => {
    const { pipeline, codes } = makePipeline();

    const report = await pipeline.execute(request);

    expect(report.result).toEqual({
      zip_file: "requests.zip",
      package: "requests",
      version: "2.31.0",
      requirements_hash: REQUESTS_HASH,
      license_info: "MIT",
    });
    expect(report.outcome).toBe("published");
    expect(report.manifest.text).toBe(REQUESTS_MANIFEST);
    expect(report.stages).toEqual(["start", "installed", "manifested", "archived", "published", "done"]);

    expect(blobs.puts.map((p) => [p.bucket, p.key])).toEqual([["layers", "requests.zip"]]);
    expect(ledgerStore.inserts).toHaveLength(1);
    expect(ledgerStore.inserts[0]).toMatchObject({
      package: "requests",
      version: "2.31.0",
      requirements: REQUESTS_MANIFEST,
      requirements_hash: REQUESTS_HASH,
    });
    expect(codes()).toContain("BUILD_PUBLISHED");
  });

  it("installs into <workRoot>/<package>/python and archives to <workRoot>/<package>.zip", async () => {
    const { pipeline } = makePipeline();

    const report = await pipeline.execute(request);

    expect(installer.calls).toEqual([{ spec: "requests", targetDir: path.join(tmpDir, "requests", "python") }]);
    expect(report.treeDir).toBe(path.join(tmpDir, "requests", "python"));
    expect(report.archivePath).toBe(path.join(tmpDir, "requests.zip"));
  });

  it("writes requirements.txt into the tree before archiving", async () => {
    const { pipeline } = makePipeline();

    const report = await pipeline.execute(request);

    expect(fs.readFileSync(path.join(report.treeDir, REQUIREMENTS_FILE), "utf8")).toBe(REQUESTS_MANIFEST);
    const entries = unzipSync(new Uint8Array(fs.readFileSync(report.archivePath)));
    expect(strFromU8(entries["python/requirements.txt"])).toBe(REQUESTS_MANIFEST);
    expect(Object.keys(entries)).toContain("python/requests-2.31.0.dist-info/METADATA");
  });

  it("skips upload and record when the ledger already has the fingerprint", async () => {
    await makePipeline().pipeline.execute(request);
    expect(blobs.puts).toHaveLength(1);
    expect(ledgerStore.inserts).toHaveLength(1);

    const { pipeline, codes } = makePipeline();
    const second = await pipeline.execute(request);

    expect(blobs.puts).toHaveLength(1);
    expect(ledgerStore.inserts).toHaveLength(1);
    expect(second.outcome).toBe("skipped");
    expect(second.stages).toEqual(["start", "installed", "manifested", "archived", "skipped", "done"]);
    expect(second.result).toEqual({
      zip_file: "requests.zip",
      package: "requests",
      version: "2.31.0",
      requirements_hash: REQUESTS_HASH,
      license_info: "MIT",
    });
    expect(codes()).toContain("BUILD_SKIPPED");
    expect(codes()).not.toContain("BUILD_PUBLISHED");
  });

  it("still archives a duplicate build", async () => {
    await makePipeline().pipeline.execute(request);
    fs.rmSync(path.join(tmpDir, "requests.zip"));

    const second = await makePipeline().pipeline.execute(request);

    expect(second.outcome).toBe("skipped");
    expect(fs.existsSync(second.archivePath)).toBe(true);
  });

  it("publishes again when a dependency version changes", async () => {
    await makePipeline().pipeline.execute(request);
    installer.layout = {
      "requests-2.31.0.dist-info/METADATA": "",
      "urllib3-2.0.7.dist-info/METADATA": "",
    };

    const second = await makePipeline().pipeline.execute(request);

    expect(second.outcome).toBe("published");
    expect(second.result.requirements_hash).not.toBe(REQUESTS_HASH);
    expect(blobs.puts).toHaveLength(2);
    expect(ledgerStore.records).toHaveLength(2);
  });

  it("treats a numeric version as text and echoes license_info untouched", async () => {
    const license = { spdx: "Apache-2.0", urls: ["https://example.com/license"] };
    const res = await makePipeline().pipeline.run({ package: "requests", version: 3, license_info: license });

    expect(res.version).toBe("3");
    expect(res.license_info).toBe(license);
  });

  it("pins the install spec when configured", async () => {
    await makePipeline({ pinVersion: true }).pipeline.execute(request);
    expect(installer.calls[0].spec).toBe("requests==2.31.0");
  });

  it("result conforms to the pipeline-result schema", async () => {
    const res = await makePipeline().pipeline.run(request);
    const check = await registry.check("pipeline-result", res);
    expect(check.valid).toBe(true);
  });

  it("rejects a request without license_info before installing", async () => {
    const { pipeline } = makePipeline();

    const err = await pipeline.execute({ package: "requests", version: "2.31.0" }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PipelineError);
    if (!(err instanceof PipelineError)) return;
    expect(err.code).toBe("REQUEST_INVALID");
    expect(err.stage).toBe("start");
    expect(installer.calls).toHaveLength(0);
  });

  it("rejects a package name that is not a single path segment", async () => {
    const { pipeline } = makePipeline();
    await expect(pipeline.execute({ ...request, package: "../etc" })).rejects.toMatchObject({ code: "REQUEST_INVALID" });
  });

  it("aborts on installer failure without touching the ledger or store", async () => {
    installer.failWith = new Error("pip exited with 1");
    const { pipeline, codes } = makePipeline();

    const err = await pipeline.execute(request).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PipelineError);
    if (!(err instanceof PipelineError)) return;
    expect(err.code).toBe("INSTALL_FAILED");
    expect(err.stage).toBe("start");
    expect(ledgerStore.queries).toBe(0);
    expect(blobs.puts).toHaveLength(0);
    expect(codes()).toEqual(["INSTALL_FAILED"]);
  });

  it("fails the install stage when the installed tree cannot be read", async () => {
    const { reporter, codes } = collectingReporter();
    const missingTree: Installer = { install: async () => path.join(tmpDir, "vanished") };
    const pipeline = new BuildPipeline(
      {
        installer: missingTree,
        ledger: new LedgerClient(ledgerStore, { reporter }),
        publisher: new ArtifactPublisher({ bucket: "layers", store: blobs, reporter }),
        registry,
        reporter,
      },
      { workRoot: tmpDir },
    );

    await expect(pipeline.execute(request)).rejects.toMatchObject({ code: "INSTALL_FAILED", stage: "start" });
    expect(codes()).toEqual(["INSTALL_FAILED"]);
    expect(ledgerStore.queries).toBe(0);
  });

  it("does not upload when the ledger query fails", async () => {
    ledgerStore.failQuery = new Error("ledger unreachable");
    const { pipeline } = makePipeline();

    const err = await pipeline.execute(request).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PipelineError);
    if (!(err instanceof PipelineError)) return;
    expect(err.code).toBe("LEDGER_QUERY_FAILED");
    expect(err.stage).toBe("archived");
    expect(blobs.puts).toHaveLength(0);
    expect(ledgerStore.inserts).toHaveLength(0);
  });

  it("does not record when the upload fails", async () => {
    blobs.failPut = new Error("AccessDenied");
    const { pipeline } = makePipeline();

    await expect(pipeline.execute(request)).rejects.toMatchObject({ code: "PUBLISH_FAILED" });
    expect(ledgerStore.inserts).toHaveLength(0);
  });

  it("surfaces a ledger write failure after the upload happened", async () => {
    ledgerStore.failInsert = new Error("throttled");
    const { pipeline } = makePipeline();

    await expect(pipeline.execute(request)).rejects.toMatchObject({
      code: "LEDGER_WRITE_FAILED",
      stage: "archived",
    });
    expect(blobs.puts).toHaveLength(1);
  });

  it("completes when a racing build recorded the fingerprint between check and record", async () => {
    const racing = new InMemoryLedgerStore();
    const originalCount = racing.count.bind(racing);
    racing.count = async (pkg, fingerprint) => {
      const matches = await originalCount(pkg, fingerprint);
      racing.records.push({
        package: pkg,
        version: "2.31.0",
        requirements: REQUESTS_MANIFEST,
        requirements_hash: fingerprint,
        created_date: "2026-01-01T00:00:00.000Z",
      });
      return matches;
    };
    ledgerStore = racing;
    const { pipeline, codes } = makePipeline();

    const report = await pipeline.execute(request);

    expect(report.outcome).toBe("published");
    expect(racing.records).toHaveLength(1);
    expect(codes()).toContain("LEDGER_DUPLICATE");
  });
});
