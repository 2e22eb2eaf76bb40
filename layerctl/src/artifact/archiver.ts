import fs from "node:fs";
import path from "node:path";
import { zipSync, type ZipAttributes, type Zippable } from "fflate";
import { PipelineError, errorMessage } from "../core/errors.js";
import { walkTree } from "../fs/tree.js";

export const DEFAULT_ARCHIVE_EXTENSION = ".zip";

const OS_UNIX = 3;
const MSDOS_DIR = 0x10;

/** Unix mode in the high half of the external attributes, as Info-ZIP writes it. */
function unixAttributes(mode: number, isDir: boolean): ZipAttributes {
  return { os: OS_UNIX, attrs: (((mode & 0xffff) << 16) | (isDir ? MSDOS_DIR : 0)) >>> 0 };
}

/**
 * Zip `treeDir` into `<outDir>/<pkg><extension>`.
 *
 * Every entry sits under the tree's own base name, so unpacking
 * `/tmp/x/requests/python` gives back a `python/` folder. Directories get
 * explicit `name/` entries so empty ones survive the round trip, and every
 * entry carries its Unix mode so executables stay executable.
 */
export function archiveTree(
  treeDir: string,
  pkg: string,
  outDir: string,
  extension: string = DEFAULT_ARCHIVE_EXTENSION,
): string {
  const rootName = path.basename(path.resolve(treeDir));
  const zipPath = path.join(outDir, `${pkg}${extension}`);

  try {
    const files: Zippable = {
      [`${rootName}/`]: [new Uint8Array(0), unixAttributes(fs.statSync(treeDir).mode, true)],
    };
    for (const entry of walkTree(treeDir)) {
      const name = `${rootName}/${entry.relPath}`;
      if (entry.kind === "dir") {
        files[`${name}/`] = [new Uint8Array(0), unixAttributes(entry.mode, true)];
      } else {
        files[name] = [fs.readFileSync(entry.path), unixAttributes(entry.mode, false)];
      }
    }

    const data = zipSync(files, { level: 6 });
    fs.mkdirSync(outDir, { recursive: true });
    fs.writeFileSync(zipPath, data);
  } catch (e) {
    throw new PipelineError("ARCHIVE_FAILED", `Failed to archive ${treeDir}: ${errorMessage(e)}`, {
      cause: e,
      details: { treeDir, zipPath },
    });
  }

  return zipPath;
}
