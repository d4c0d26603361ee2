#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { loadVocabulary } from "../anonymize/vocabulary.js";
import { GatherAgent } from "../core/agent.js";
import { ConfigError, loadConfig, type GatherConfig } from "../core/config.js";
import { CollectError, FlushError } from "../core/errors.js";
import type { GatherReport } from "../core/models.js";
import { ALL_GATHERERS, isGathererName, type GathererName } from "../gatherers/index.js";
import { DirectoryRecorder } from "../recorder/directory.js";
import { renderReport, type OutputFormat } from "../report/index.js";
import { KubectlSource } from "../source/kubectl.js";
import { logger, LogLevel, setLogLevel } from "../utils/logger.js";
import { createProgressCallbacks } from "./display.js";

const EXIT_FAILED = 1;
const EXIT_ABORTED = 130;

interface GatherCommandOptions {
  format: string;
  output?: string;
  namespace?: string;
  kubeconfig?: string;
  context?: string;
  kubectl?: string;
  vocabulary?: string;
  only?: string;
  allOperators?: boolean;
  verbose?: boolean;
}

function parseOnly(value: string | undefined): GathererName[] | undefined {
  if (!value) return undefined;
  const names = value.split(",").map((n) => n.trim()).filter((n) => n.length > 0);
  const invalid = names.filter((n) => !isGathererName(n));
  if (invalid.length > 0) {
    console.error(`Unknown gatherers: ${invalid.join(", ")}`);
    console.error(`Available: ${ALL_GATHERERS.join(", ")}`);
    process.exit(EXIT_FAILED);
  }
  return names.filter(isGathererName);
}

function parseFormat(value: string): OutputFormat {
  if (value === "terminal" || value === "json") return value;
  console.error(`Unknown format: ${value}`);
  process.exit(EXIT_FAILED);
}

function resolveConfig(opts: GatherCommandOptions): GatherConfig {
  try {
    return loadConfig({
      outputDir: opts.output,
      namespace: opts.namespace,
      kubeconfig: opts.kubeconfig,
      context: opts.context,
      kubectl: opts.kubectl,
      vocabularyFile: opts.vocabulary,
      allClusterOperators: opts.allOperators,
    });
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(chalk.red(err.message));
      process.exit(EXIT_FAILED);
    }
    throw err;
  }
}

const program = new Command();

program
  .name("cluster-gather")
  .description("Collect anonymized cluster configuration and health records")
  .version("0.1.0");

program
  .command("gather", { isDefault: true })
  .description("Run one gather batch and write the records to a directory")
  .option("-f, --format <format>", "Summary format: terminal, json", "terminal")
  .option("-o, --output <dir>", "Directory the records are written to")
  .option("-n, --namespace <name>", "Namespace prefix of the report record")
  .option("--kubeconfig <path>", "kubeconfig file passed to kubectl")
  .option("--context <name>", "kubeconfig context passed to kubectl")
  .option("--kubectl <path>", "kubectl binary")
  .option("--vocabulary <file>", "JSON file of words the URL anonymizer keeps")
  .option("--only <gatherers>", "Comma-separated list of gatherers to run")
  .option("--all-operators", "Record healthy cluster operators too")
  .option("-v, --verbose", "Log at debug level")
  .action(async (opts: GatherCommandOptions) => {
    if (opts.verbose) setLogLevel(LogLevel.Debug);
    const format = parseFormat(opts.format);
    const only = parseOnly(opts.only);
    const interactive = format === "terminal" && process.stderr.isTTY === true;

    const config = resolveConfig(opts);

    const vocabulary = await loadVocabulary(config.vocabularyFile);
    const source = new KubectlSource({
      kubectl: config.kubectl,
      kubeconfig: config.kubeconfig,
      context: config.context,
      timeoutMs: config.timeoutMs,
    });
    const agent = new GatherAgent({ source, config, vocabulary, only });
    const recorder = new DirectoryRecorder(config.outputDir);

    const controller = new AbortController();
    process.once("SIGINT", () => controller.abort(new Error("gather interrupted")));

    const callbacks = interactive ? createProgressCallbacks(agent.gatherers.length) : {};

    const startedAt = new Date();
    let reports: GatherReport[];
    let exitCode = 0;
    try {
      reports = await agent.run(recorder, controller.signal, callbacks);
    } catch (err) {
      if (controller.signal.aborted) {
        logger.warn("Gather aborted; records already collected are not written");
        process.exit(EXIT_ABORTED);
      }
      if (!(err instanceof CollectError)) throw err;
      logger.error(err.message);
      reports = err.reports;
      exitCode = EXIT_FAILED;
    }

    try {
      await recorder.flush();
    } catch (err) {
      if (!(err instanceof FlushError)) throw err;
      logger.error(err.message);
      exitCode = EXIT_FAILED;
    }

    const output = renderReport(reports, format, startedAt);
    if (format === "terminal") {
      console.log(output);
    } else {
      process.stdout.write(output + "\n");
    }
    process.exit(exitCode);
  });

program.parseAsync().catch((err: unknown) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(EXIT_FAILED);
});
