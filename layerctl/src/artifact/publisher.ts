import fs from "node:fs";
import { PipelineError, errorMessage } from "../core/errors.js";
import { sha256Hex } from "../fingerprint/digest.js";
import { diag, silentReporter, type Reporter } from "../log/reporter.js";
import type { BlobStore } from "./blob-store.js";

export type ArtifactPublisherOptions = {
  bucket: string;
  store: BlobStore;
  reporter?: Reporter;
};

/** Object key for a package's archive: `requests` → `requests.zip`. */
export function objectKeyFor(pkg: string, extension: string): string {
  return `${pkg}${extension}`;
}

/**
 * Uploads archives to the blob store. The upload call decides success; the
 * listing afterwards is only read back for the log.
 */
export class ArtifactPublisher {
  private readonly bucket: string;
  private readonly store: BlobStore;
  private readonly reporter: Reporter;

  constructor(opts: ArtifactPublisherOptions) {
    this.bucket = opts.bucket;
    this.store = opts.store;
    this.reporter = opts.reporter ?? silentReporter;
  }

  async publish(archivePath: string, pkg: string, key: string): Promise<string> {
    let size: number;
    let sha256: string;
    try {
      const body = fs.readFileSync(archivePath);
      size = body.length;
      sha256 = sha256Hex(body);
      await this.store.put(this.bucket, key, body);
    } catch (e) {
      throw new PipelineError("PUBLISH_FAILED", `Upload of ${key} to ${this.bucket} failed: ${errorMessage(e)}`, {
        cause: e,
        details: { bucket: this.bucket, key, archivePath },
      });
    }

    this.reporter(
      diag("info", "PUBLISH_UPLOADED", `Uploaded ${archivePath} to ${this.bucket}/${key}`, {
        path: archivePath,
        details: { bucket: this.bucket, key, bytes: size, sha256 },
      }),
    );
    await this.readBack(pkg, key);
    return key;
  }

  private async readBack(pkg: string, key: string): Promise<void> {
    try {
      const objects = await this.store.list(this.bucket, pkg);
      const obj = objects.find((o) => o.key === key) ?? objects[0];
      if (!obj) {
        this.reporter(diag("warn", "PUBLISH_READBACK_EMPTY", `No objects under prefix ${pkg} in ${this.bucket}`));
        return;
      }
      const modified = obj.last_modified ? obj.last_modified.toISOString() : "unknown";
      this.reporter(
        diag("info", "PUBLISH_OK", `Uploaded ${obj.key} with size ${obj.size} at ${modified} to ${this.bucket}`, {
          details: { bucket: this.bucket, key: obj.key, size: obj.size, last_modified: modified },
        }),
      );
    } catch (e) {
      this.reporter(
        diag("warn", "PUBLISH_READBACK_FAILED", `Could not list ${this.bucket}/${pkg}: ${errorMessage(e)}`, {
          details: { bucket: this.bucket, prefix: pkg },
        }),
      );
    }
  }
}
