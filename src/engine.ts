// Engine facade: the caller contract of the toolchain wrapper.
//   execute(logicalCommand)   read-side only; serves stored results or the "not executed" sentinel
//   buildAndRun(request)      builder -> scratch resolver -> runner -> classifier -> cache
//   saveResult/storeResult    write-side for results produced elsewhere
import type { CommandResult, OperationRequest } from "./types/command.js";
import type { EngineOutcome } from "./types/outcome.js";
import type { EngineConfig } from "./types/config.js";
import { loadConfig, resolveCacheDir, resolveWorkdir } from "./config/loader.js";
import { InvocationBuilder } from "./execution/invocation.js";
import { defaultScratchCandidates, resolveScratchEnvironment } from "./execution/environment.js";
import { LocalExecutor, type Executor } from "./execution/executor.js";
import { ProcessRunner } from "./execution/runner.js";
import { classify } from "./classify/classifier.js";
import { ResultCache } from "./cache/result-cache.js";
import { FileResultStore, type ResultStore } from "./cache/store.js";
import { logger } from "./logger.js";

export interface EngineDeps {
  config: EngineConfig;
  executor?: Executor;
  store?: ResultStore;
  /** Scratch-directory candidates in priority order; defaults to the workdir/home trio. */
  scratchCandidates?: readonly string[];
  baseEnv?: NodeJS.ProcessEnv;
}

export interface StoredOutput {
  stdout: string;
  stderr?: string;
  success?: boolean;
}

export class ArduinoCliEngine {
  readonly config: EngineConfig;
  readonly workdir: string;
  readonly cache: ResultCache;
  private readonly builder: InvocationBuilder;
  private readonly runner: ProcessRunner;
  private readonly scratchCandidates: readonly string[];

  constructor(deps: EngineDeps) {
    this.config = deps.config;
    this.workdir = resolveWorkdir(deps.config);
    this.cache = new ResultCache(
      deps.store ?? new FileResultStore(resolveCacheDir(deps.config)),
      deps.config.cli.binary,
    );
    this.builder = new InvocationBuilder({
      workdir: this.workdir,
      verboseCompile: deps.config.cli.verbose_compile,
    });
    this.runner = new ProcessRunner(deps.executor ?? new LocalExecutor(), {
      binary: deps.config.cli.binary,
      policy: { maxAttempts: deps.config.cli.max_attempts },
      cwd: this.workdir,
      baseEnv: deps.baseEnv,
    });
    this.scratchCandidates = deps.scratchCandidates ?? defaultScratchCandidates(this.workdir);
  }

  async execute(logicalCommand: string): Promise<CommandResult> {
    return this.cache.getOrReportUnexecuted(logicalCommand);
  }

  async saveResult(logicalCommand: string, result: CommandResult): Promise<void> {
    await this.cache.save(logicalCommand, result);
  }

  /** Record output of a command that was run outside the engine. */
  async storeResult(logicalCommand: string, output: StoredOutput): Promise<CommandResult> {
    const result: CommandResult = {
      logicalCommand,
      command: `${this.config.cli.binary} ${logicalCommand}`,
      success: output.success ?? true,
      stdout: output.stdout,
      stderr: output.stderr ?? "",
    };
    await this.cache.save(logicalCommand, result);
    return result;
  }

  async buildAndRun(request: OperationRequest): Promise<EngineOutcome> {
    const invocation = await this.builder.build(request);
    // Read before running: write-through below would replace the known-good record.
    const prior =
      request.operation === "compile" && this.config.cache.stale_fallback
        ? await this.cache.get(invocation.logicalCommand)
        : undefined;

    const scratch = await resolveScratchEnvironment(this.scratchCandidates);
    const report = await this.runner.run(invocation, scratch.env);
    const base = {
      operation: request.operation,
      logicalCommand: invocation.logicalCommand,
      attempts: report.attempts,
      buildPath: invocation.buildPath,
    };

    const transient = report.exhausted;
    if (transient && prior?.success) {
      logger.warn(
        { logicalCommand: invocation.logicalCommand, attempts: report.attempts, source: "cache-fallback" },
        "Live compile hit a temporary-file failure; serving the last successful result instead",
      );
      return { ...base, ...classify(prior, request.operation), result: prior, source: "cache-fallback" };
    }

    // A toolchain stuck on temp files says nothing about the sketch; keep the previous record.
    if (!transient) {
      await this.writeThrough(invocation.logicalCommand, report.result);
    }
    return { ...base, ...classify(report.result, request.operation), result: report.result, source: "executed" };
  }

  /** The tool already ran; a failing durable store must not cost the caller its output. */
  private async writeThrough(logicalCommand: string, result: CommandResult): Promise<void> {
    try {
      await this.cache.save(logicalCommand, result);
    } catch (err) {
      logger.warn({ logicalCommand, error: err instanceof Error ? err.message : String(err) }, "Could not persist command result");
    }
  }
}

export interface CreateEngineOptions extends Omit<EngineDeps, "config"> {
  /** Defaults to $ARDUINO_CLI_ENGINE_CONFIG, then ~/.config/arduino-cli-engine/config.yaml. */
  configPath?: string;
}

/** Load configuration from disk and build an engine around it. */
export function createEngine(options: CreateEngineOptions = {}): ArduinoCliEngine {
  const { configPath, ...deps } = options;
  const loaded = loadConfig(configPath);
  logger.info({ configPath: loaded.configPath, firstRun: loaded.firstRun }, "Configuration loaded");
  return new ArduinoCliEngine({ config: loaded.config, ...deps });
}
