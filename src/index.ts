#!/usr/bin/env node

import { Command } from "commander";
import dotenv from "dotenv";
import { loadConfig, type CatalogConfig, type ConfigOverrides } from "./config.js";
import {
  buildCommand,
  diffAllCommand,
  diffCommand,
  dumpCommand,
  exitCodeFor,
  listCommand,
  type ViewOptions,
} from "./cli/commands.js";

dotenv.config();

interface GlobalOptions {
  projectDir?: string;
  baseline?: string;
  corpus?: string;
  serviceList?: string;
  serviceContexts?: string;
}

interface ViewFlags {
  contexts?: boolean;
  namesOnly?: boolean;
  json?: boolean;
}

const program = new Command();

program
  .name("txcat")
  .description("Catalog system-service IPC transactions and diff them against a baseline build")
  .version("0.1.0")
  .option("--project-dir <dir>", "Project directory holding the catalog (overrides TXCAT_PROJECT_DIR)")
  .option("--baseline <dir>", "Directory of the baseline catalog (overrides TXCAT_BASELINE_DIR)")
  .option("--corpus <dir>", "Disassembled framework corpus (overrides TXCAT_CORPUS_DIR)")
  .option("--service-list <file>", "Captured `service list` output (overrides TXCAT_SERVICE_LIST)")
  .option("--service-contexts <file>", "service_contexts file for security labels (overrides TXCAT_SERVICE_CONTEXTS)");

function resolveConfig(): CatalogConfig {
  const opts = program.opts<GlobalOptions>();
  const overrides: ConfigOverrides = {
    projectDir: opts.projectDir,
    baselineDir: opts.baseline,
    corpusDir: opts.corpus,
    serviceListPath: opts.serviceList,
    serviceContextsPath: opts.serviceContexts,
  };
  return loadConfig(overrides);
}

function viewOptions(flags: ViewFlags): ViewOptions {
  return { contexts: flags.contexts ?? false, namesOnly: flags.namesOnly ?? false, json: flags.json ?? false };
}

function run(fn: () => number): void {
  try {
    process.exitCode = fn();
  } catch (error) {
    process.exitCode = exitCodeFor(error);
  }
}

program
  .command("build")
  .description("Rebuild the project catalog from the service list and disassembled corpus")
  .option("--json", "Output JSON format")
  .action((flags: { json?: boolean }) => {
    run(() => buildCommand(resolveConfig(), { json: flags.json ?? false }));
  });

program
  .command("diff")
  .description("Diff one service against the baseline catalog")
  .argument("<service>", "Service name")
  .option("--contexts", "Show security-context labels")
  .option("--names-only", "Only print service names and NEW tags")
  .option("--json", "Output JSON format")
  .action((service: string, flags: ViewFlags) => {
    run(() => diffCommand(resolveConfig(), service, viewOptions(flags)));
  });

program
  .command("diff-all")
  .description("Diff every project service against the baseline catalog")
  .option("--contexts", "Show security-context labels")
  .option("--names-only", "Only print service names and NEW tags")
  .option("--json", "Output JSON format")
  .action((flags: ViewFlags) => {
    run(() => diffAllCommand(resolveConfig(), viewOptions(flags)));
  });

program
  .command("dump")
  .description("Print every transaction of one service in the project catalog")
  .argument("<service>", "Service name")
  .option("--contexts", "Show security-context labels")
  .option("--json", "Output JSON format")
  .action((service: string, flags: ViewFlags) => {
    run(() => dumpCommand(resolveConfig(), service, viewOptions(flags)));
  });

program
  .command("list")
  .description("List services in the project catalog, tagging those absent from the baseline")
  .option("--contexts", "Show security-context labels")
  .option("--names-only", "Only print service names and NEW tags")
  .option("--json", "Output JSON format")
  .action((flags: ViewFlags) => {
    run(() => listCommand(resolveConfig(), viewOptions(flags)));
  });

program.parse();
