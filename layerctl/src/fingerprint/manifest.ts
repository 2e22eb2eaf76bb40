import fs from "node:fs";
import path from "node:path";
import { walkTree } from "../fs/tree.js";
import type { DependencyManifest } from "../types/build.js";
import { sha256Hex } from "./digest.js";

const DIST_INFO_SUFFIX = ".dist-info";
const EGG_INFO_SUFFIX = "egg-info";
const PKG_INFO = "PKG-INFO";

export type Requirement = { name: string; version: string };

/** `foo-1.2.3.dist-info` → foo / 1.2.3. Null for other names or a missing version segment. */
export function parseDistInfoName(dirName: string): Requirement | null {
  if (!dirName.endsWith(DIST_INFO_SUFFIX)) return null;
  const [name, version] = dirName.slice(0, -DIST_INFO_SUFFIX.length).split("-");
  if (!name || !version) return null;
  return { name, version };
}

/**
 * Read `Name:` and `Version:` headers from PKG-INFO content. Matching is
 * case-sensitive on the line start; a later line wins over an earlier one.
 * Null unless both values are non-empty.
 */
export function parsePkgInfo(content: string): Requirement | null {
  let name = "";
  let version = "";
  for (const line of content.split("\n")) {
    if (line.startsWith("Version:")) version = line.slice("Version:".length).trim();
    if (line.startsWith("Name:")) name = line.slice("Name:".length).trim();
  }
  if (!name || !version) return null;
  return { name, version };
}

export function formatRequirement(req: Requirement): string {
  return `${req.name}==${req.version}`;
}

/** Every `name==version` found below `root`, in walk order. */
export function collectRequirements(root: string): string[] {
  const found: string[] = [];
  for (const entry of walkTree(root)) {
    const base = path.basename(entry.path);
    if (entry.kind === "dir") {
      const req = parseDistInfoName(base);
      if (req) found.push(formatRequirement(req));
    } else if (base === PKG_INFO && path.basename(path.dirname(entry.path)).endsWith(EGG_INFO_SUFFIX)) {
      const req = parsePkgInfo(fs.readFileSync(entry.path, "utf8"));
      if (req) found.push(formatRequirement(req));
    }
  }
  return found;
}

/** Deduplicate, sort, join and digest. The result does not depend on input order. */
export function renderManifest(entries: Iterable<string>): DependencyManifest {
  const sorted = [...new Set(entries)].sort();
  const text = sorted.join("\n").trim();
  return { entries: sorted, text, fingerprint: sha256Hex(text) };
}

export function buildDependencyManifest(root: string): DependencyManifest {
  return renderManifest(collectRequirements(root));
}
