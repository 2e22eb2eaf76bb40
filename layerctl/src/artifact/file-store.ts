import fs from "node:fs";
import path from "node:path";
import { walkTree } from "../fs/tree.js";
import type { BlobObject, BlobStore } from "./blob-store.js";

function isWithinDir(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(rootDir, candidatePath);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

/** Objects stored as files under `<rootDir>/<bucket>/<key>`, for local builds. */
export class FileBlobStore implements BlobStore {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  pathFor(bucket: string, key: string): string {
    const bucketDir = path.join(this.rootDir, bucket);
    const target = path.resolve(bucketDir, key);
    if (!isWithinDir(bucketDir, target)) {
      throw new Error(`Object key escapes bucket directory: ${key}`);
    }
    return target;
  }

  async put(bucket: string, key: string, body: Uint8Array): Promise<void> {
    const target = this.pathFor(bucket, key);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, body);
  }

  async list(bucket: string, prefix: string): Promise<BlobObject[]> {
    const bucketDir = path.join(this.rootDir, bucket);
    if (!fs.existsSync(bucketDir)) return [];
    return walkTree(bucketDir)
      .filter((e) => e.kind === "file" && e.relPath.startsWith(prefix))
      .map((e) => ({ key: e.relPath, size: e.size, last_modified: fs.statSync(e.path).mtime }));
  }
}
