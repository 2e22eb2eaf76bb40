import fs from "node:fs";
import path from "node:path";
import { buildDependencyManifest } from "../fingerprint/manifest.js";
import type { DependencyManifest } from "../types/build.js";

export type FingerprintResult = { ok: true; manifest: DependencyManifest } | { ok: false; error: string };

/**
 * Manifest and fingerprint of an already-installed tree, without installing
 * or publishing anything.
 */
export function fingerprint(opts: { dir: string }): FingerprintResult {
  const dir = path.resolve(opts.dir);
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    return { ok: false, error: `Not a directory: ${dir}` };
  }
  return { ok: true, manifest: buildDependencyManifest(dir) };
}
