import { execFile } from "node:child_process";
import fs from "node:fs";
import { promisify } from "node:util";
import { PipelineError, errorMessage } from "../core/errors.js";
import { diag, silentReporter, type Reporter } from "../log/reporter.js";
import type { BuildRequest } from "../types/build.js";

const pExecFile = promisify(execFile);

const MAX_CMD_BUFFER_SIZE = 50 * 1024 * 1024; // 50MB

export type ExecResult = { stdout: string; stderr: string };
export type ExecFn = (command: string, args: string[]) => Promise<ExecResult>;

/** Materializes a package and its resolved dependencies into a directory. */
export interface Installer {
  install(spec: string, targetDir: string): Promise<string>;
}

export type PipInstallerOptions = {
  command?: string;
  extraArgs?: string[];
  exec?: ExecFn;
  reporter?: Reporter;
};

const defaultExec: ExecFn = async (command, args) => {
  const { stdout, stderr } = await pExecFile(command, args, { maxBuffer: MAX_CMD_BUFFER_SIZE });
  return { stdout, stderr };
};

/** `requests`, or `requests==2.31.0` when pinning. */
export function installSpecFor(request: BuildRequest, pinVersion: boolean): string {
  return pinVersion ? `${request.package}==${request.version}` : request.package;
}

function stderrOf(e: unknown): string {
  if (typeof e === "object" && e !== null && "stderr" in e && typeof e.stderr === "string" && e.stderr.trim()) {
    return e.stderr.trim();
  }
  return errorMessage(e);
}

/**
 * Installs with `pip install -t`, always upgrading and bypassing the pip
 * cache so every run resolves from the index.
 */
export class PipInstaller implements Installer {
  private readonly command: string;
  private readonly extraArgs: string[];
  private readonly exec: ExecFn;
  private readonly reporter: Reporter;

  constructor(opts: PipInstallerOptions = {}) {
    this.command = opts.command ?? "pip";
    this.extraArgs = opts.extraArgs ?? [];
    this.exec = opts.exec ?? defaultExec;
    this.reporter = opts.reporter ?? silentReporter;
  }

  buildArgs(spec: string, targetDir: string): string[] {
    return ["install", spec, "-t", targetDir, "--quiet", "--upgrade", "--no-cache-dir", ...this.extraArgs];
  }

  async install(spec: string, targetDir: string): Promise<string> {
    this.clean(targetDir);

    const args = this.buildArgs(spec, targetDir);
    let result: ExecResult;
    try {
      result = await this.exec(this.command, args);
    } catch (e) {
      throw new PipelineError("INSTALL_FAILED", `${this.command} install ${spec} failed: ${stderrOf(e)}`, {
        cause: e,
        details: { command: this.command, args },
      });
    }

    this.reporter(
      diag("info", "INSTALL_OK", `Installed ${spec} into ${targetDir}`, {
        path: targetDir,
        details: { stderr: result.stderr.trim() },
      }),
    );
    return targetDir;
  }

  /** Remove a previous tree at `targetDir`; a missing directory is fine. */
  private clean(targetDir: string): void {
    if (!fs.existsSync(targetDir)) {
      this.reporter(diag("info", "INSTALL_NO_PREVIOUS", "No previous installation detected", { path: targetDir }));
      return;
    }
    fs.rmSync(targetDir, { recursive: true, force: true });
    this.reporter(diag("info", "INSTALL_CLEANED", "Deleted previous version of package directory", { path: targetDir }));
  }
}
