import fs from "node:fs/promises";
import path from "node:path";
import { loadConfig } from "../config/config-loader.js";
import { ConfigError } from "../errors/errors.js";
import { loadTargetFile } from "../ingest/target-loader.js";
import type { Logger } from "../logger/logger.js";
import { ScanOrchestrator } from "../orchestrator/scan-orchestrator.js";
import type { PluginSource } from "../providers/plugin-loader.js";
import type { CommandRunner } from "../providers/opa/command-runner.js";
import { renderReport } from "../report/render.js";
import { REPORT_FORMATS, type ReportFormat } from "../report/types.js";
import type { ScanResult, TargetKind } from "../scanner/types.js";
import { DEFAULT_IGNORE_FILE } from "../suppression/suppression-manager.js";

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_NOT_READY = 2;

export interface ScanOptions {
  readonly kind: TargetKind;
  readonly target: string;
  readonly format: ReportFormat;
  readonly out?: string;
  readonly ignore?: readonly string[];
  readonly ignoreFile?: string;
  readonly configPath?: string;
  readonly threshold?: number;
  readonly timeoutMs?: number;
  readonly failOnNotReady?: boolean;
  readonly cwd?: string;
  readonly logger?: Logger;
  readonly pluginSources?: readonly PluginSource[];
  readonly opaRunner?: CommandRunner;
}

export interface ScanCommandResult {
  readonly result: ScanResult;
  readonly output: string;
  readonly exitCode: number;
}

export async function runScanCommand(
  options: ScanOptions,
  toolVersion: string,
): Promise<ScanCommandResult> {
  const cwd = options.cwd ?? process.cwd();
  const { config, baseDir } = await loadConfig(options.configPath, cwd);
  const target = await loadTargetFile(path.resolve(cwd, options.target));

  const orchestrator = await ScanOrchestrator.create({
    providerTimeoutMs: options.timeoutMs ?? config.providerTimeoutMs,
    ignoreRules: [...config.ignore, ...(options.ignore ?? [])],
    ignoreFile: options.ignoreFile
      ? path.resolve(cwd, options.ignoreFile)
      : (config.ignoreFile ?? path.join(cwd, DEFAULT_IGNORE_FILE)),
    scoring: {
      penalties: config.scoring.penalties,
      threshold: options.threshold ?? config.scoring.threshold,
    },
    heuristic: config.heuristic,
    opa: { ...config.opa, runner: options.opaRunner },
    plugins: config.plugins,
    baseDir,
    pluginSources: options.pluginSources,
    logger: options.logger,
  });

  const label = path.relative(cwd, target.path) || target.path;
  const result =
    options.kind === "tool"
      ? await orchestrator.scanTool(target.document, label)
      : await orchestrator.scanConfig(target.document, label);

  const output = renderReport(result, options.format, { toolVersion });
  if (options.out) {
    await fs.writeFile(path.resolve(cwd, options.out), `${output}\n`, "utf8");
  }

  return { result, output, exitCode: exitCodeFor(result, options.failOnNotReady) };
}

export function exitCodeFor(result: ScanResult, failOnNotReady = false): number {
  return failOnNotReady && !result.is_production_ready ? EXIT_NOT_READY : EXIT_OK;
}

export function parseFormat(value: string): ReportFormat {
  const format = REPORT_FORMATS.find((candidate) => candidate === value);
  if (!format) {
    throw new ConfigError(
      `Unsupported format: ${value} (expected ${REPORT_FORMATS.join("|")})`,
    );
  }
  return format;
}

export function parseNumberOption(value: string, flag: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new ConfigError(`${flag} must be a number, got '${value}'`);
  }
  return parsed;
}
