#!/usr/bin/env node
import { Command } from "commander";
import { loadConfig } from "../config/config-loader.js";
import { createLogger, type Logger, type LogLevel } from "../logger/logger.js";
import { loadProviders } from "../providers/registry.js";
import type { TargetKind } from "../scanner/types.js";
import {
  describeProviders,
  listRules,
  renderProviderList,
  renderRuleList,
} from "./list-commands.js";
import { loadVersion } from "./runtime-paths.js";
import {
  EXIT_ERROR,
  parseFormat,
  parseNumberOption,
  runScanCommand,
} from "./scan-command.js";

interface GlobalFlags {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
}

interface ScanFlags {
  readonly format: string;
  readonly out?: string;
  readonly ignore?: string[];
  readonly ignoreFile?: string;
  readonly config?: string;
  readonly threshold?: string;
  readonly timeout?: string;
  readonly failOnNotReady?: boolean;
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("mcp-readiness")
  .description("Operational readiness scanner for MCP tool definitions and configs")
  .version(toolVersion)
  .option("--verbose", "Log provider and plugin diagnostics")
  .option("--quiet", "Only log errors");

registerScanCommand("scan-tool", "tool", "Scan an MCP tool definition (JSON or YAML)");
registerScanCommand("scan-config", "config", "Scan an MCP configuration file (JSON or YAML)");

program
  .command("list-providers")
  .description("List inspection providers and whether they can run here")
  .option("--config <path>", "Config file (default .mcp-readiness.yaml)")
  .action(async (options: { config?: string }) => {
    try {
      const logger = cliLogger();
      const { config, baseDir } = await loadConfig(options.config);
      const providers = await loadProviders({
        heuristic: config.heuristic,
        opa: config.opa,
        plugins: config.plugins,
        baseDir,
        logger,
      });
      await writeStdout(`${renderProviderList(describeProviders(providers, logger))}\n`);
    } catch (error) {
      await writeError(error);
      process.exitCode = EXIT_ERROR;
    }
  });

program
  .command("list-rules")
  .description("List the built-in heuristic rules")
  .action(async () => {
    await writeStdout(`${renderRuleList(listRules())}\n`);
  });

await program.parseAsync(process.argv);

function registerScanCommand(
  name: string,
  kind: TargetKind,
  description: string,
): void {
  program
    .command(name)
    .description(description)
    .argument("<file>", "Target file")
    .option("--format <format>", "Output format (json|md|sarif|sarif-summary)", "md")
    .option("--out <file>", "Write report to file")
    .option("--ignore <rule...>", "Rule ids to suppress")
    .option("--ignore-file <path>", "Ignore file (default .mcp-readiness-ignore)")
    .option("--config <path>", "Config file (default .mcp-readiness.yaml)")
    .option("--threshold <number>", "Readiness threshold (default 70)")
    .option("--timeout <ms>", "Per-provider timeout in milliseconds")
    .option("--fail-on-not-ready", "Exit with code 2 when not production ready")
    .action(async (file: string, options: ScanFlags) => {
      try {
        const result = await runScanCommand(
          {
            kind,
            target: file,
            format: parseFormat(options.format),
            out: options.out,
            ignore: options.ignore,
            ignoreFile: options.ignoreFile,
            configPath: options.config,
            threshold:
              options.threshold !== undefined
                ? parseNumberOption(options.threshold, "--threshold")
                : undefined,
            timeoutMs:
              options.timeout !== undefined
                ? parseNumberOption(options.timeout, "--timeout")
                : undefined,
            failOnNotReady: Boolean(options.failOnNotReady),
            logger: cliLogger(),
          },
          toolVersion,
        );

        if (!options.out) {
          await writeStdout(`${result.output}\n`);
        }
        process.exitCode = result.exitCode;
      } catch (error) {
        await writeError(error);
        process.exitCode = EXIT_ERROR;
      }
    });
}

function cliLogger(): Logger {
  const flags = program.opts<GlobalFlags>();
  const level: LogLevel | undefined = flags.quiet
    ? "error"
    : flags.verbose
      ? "debug"
      : undefined;
  return createLogger("", level);
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function writeError(error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(`error: ${message}\n`, () => resolve());
  });
}
