#!/usr/bin/env node

import { Command } from "commander";
import { build } from "./commands/build.js";
import { EXIT } from "./commands/exit-codes.js";
import { fingerprint } from "./commands/fingerprint.js";
import { ledgerCheck } from "./commands/ledger.js";
import { validateAll } from "./commands/validate.js";
import { reporterFor, type OutputFormat } from "./log/reporter.js";

const program = new Command();

program
  .name("layerctl")
  .description("Build, fingerprint and publish deduplicated dependency layers")
  .version("0.1.0")
  .enablePositionalOptions();

program
  .command("build")
  .description("Install a package, fingerprint its dependencies and publish the archive if new")
  .argument("[package]", "Package to build")
  .option("--version <version>", "Package version recorded in the ledger")
  .option("--license-info <text>", "Opaque license information echoed in the result")
  .option("--event <path>", "JSON invocation record with package, version and license_info")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment layered over base.yaml (e.g. local)")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(
    async (
      pkg: string | undefined,
      opts: { version?: string; licenseInfo?: string; event?: string; config?: string; env?: string; format: OutputFormat },
    ) => {
      const res = await build(
        {
          package: pkg,
          version: opts.version,
          licenseInfo: opts.licenseInfo,
          event: opts.event,
          configDir: opts.config,
          env: opts.env,
        },
        { reporter: reporterFor(opts.format) },
      );

      if (!res.ok) {
        if (opts.format === "jsonl") {
          process.stdout.write(JSON.stringify({ level: "error", code: res.error.code, message: res.error.message }) + "\n");
        } else {
          console.error(res.error.message);
        }
        process.exit(res.exitCode);
      }

      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify({ level: "info", code: "OK", outcome: res.outcome, result: res.result }) + "\n");
      } else {
        process.stdout.write(JSON.stringify(res.result) + "\n");
      }
    },
  );

program
  .command("fingerprint")
  .description("Print the requirements manifest and hash of an installed tree")
  .argument("<dir>", "Installed tree")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action((dir: string, opts: { format: OutputFormat }) => {
    const res = fingerprint({ dir });
    if (!res.ok) {
      console.error(res.error);
      process.exit(EXIT.INVALID_ARGS);
    }
    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify(res.manifest) + "\n");
    } else {
      if (res.manifest.text) console.log(res.manifest.text);
      console.log(`requirements_hash: ${res.manifest.fingerprint}`);
    }
  });

program
  .command("validate")
  .description("Validate layered config")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment layered over base.yaml")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: { config?: string; env?: string; format: OutputFormat }) => {
    const res = await validateAll({ configDir: opts.config, env: opts.env });

    if (!res.ok) {
      if (opts.format === "jsonl") {
        for (const err of res.errors) process.stdout.write(JSON.stringify(err) + "\n");
      } else {
        for (const err of res.errors) console.error(err.message);
      }
      process.exit(EXIT.INVALID_ARGS);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
    } else {
      console.log("OK");
    }
  });

const ledger = program.command("ledger").description("Query the requirements ledger");

ledger
  .command("check")
  .description("Exit 0 if the package was built with this requirements hash, 4 otherwise")
  .argument("<package>", "Package name")
  .argument("<hash>", "Requirements hash")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment layered over base.yaml")
  .action(async (pkg: string, hash: string, opts: { config?: string; env?: string }) => {
    const res = await ledgerCheck({ package: pkg, fingerprint: hash, configDir: opts.config, env: opts.env });
    if (!res.ok) {
      console.error(res.error);
      process.exit(res.exitCode);
    }
    console.log(res.exists ? "recorded" : "not recorded");
    process.exit(res.exitCode);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
