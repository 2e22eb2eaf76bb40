import fs from "node:fs";
import path from "node:path";

export type TreeEntry = {
  /** Absolute path. */
  path: string;
  /** Path relative to the walked root, always with forward slashes. */
  relPath: string;
  kind: "file" | "dir";
  size: number;
  /** `st_mode`, file type bits included. */
  mode: number;
};

/**
 * Recursively list a directory. Entries come back sorted by relative path,
 * so callers see the same order on every filesystem. Anything that is not
 * a regular file or directory is left out.
 */
export function walkTree(root: string): TreeEntry[] {
  const out: TreeEntry[] = [];
  collect(root, root, out);
  return out.sort((a, b) => (a.relPath < b.relPath ? -1 : a.relPath > b.relPath ? 1 : 0));
}

function collect(baseDir: string, currentDir: string, out: TreeEntry[]): void {
  const entries = fs.readdirSync(currentDir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = path.join(currentDir, entry.name);
    const relPath = path.relative(baseDir, fullPath).split(path.sep).join("/");
    if (entry.isDirectory()) {
      out.push({ path: fullPath, relPath, kind: "dir", size: 0, mode: fs.statSync(fullPath).mode });
      collect(baseDir, fullPath, out);
    } else if (entry.isFile()) {
      const stat = fs.statSync(fullPath);
      out.push({ path: fullPath, relPath, kind: "file", size: stat.size, mode: stat.mode });
    }
  }
}

/** Sum of all file sizes below `root`, in bytes. */
export function dirSize(root: string): number {
  return walkTree(root).reduce((total, e) => total + e.size, 0);
}
