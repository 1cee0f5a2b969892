import { homedir } from "node:os";
import type { CommandResult, InvocationSpec } from "../types/command.js";
import { EngineError, EngineErrorCode, isEngineError } from "../shared/errors.js";
import { logger } from "../logger.js";
import type { ExecResult, Executor } from "./executor.js";
import {
  afterMutation,
  initialState,
  nextState,
  type AttemptState,
  type RetryPolicy,
  type RetryState,
} from "./retry.js";

export interface RunReport {
  /** Reflects the last attempt made; earlier attempts are discarded. */
  readonly result: CommandResult;
  readonly attempts: number;
  /** argv of the last attempt, including any retry mutation. */
  readonly argv: readonly string[];
  readonly exitCode: number;
  /** True when the loop stopped because transient failures used up every attempt. */
  readonly exhausted: boolean;
}

export interface ProcessRunnerOptions {
  binary: string;
  policy: RetryPolicy;
  cwd?: string;
  /** Base environment, defaults to process.env. */
  baseEnv?: NodeJS.ProcessEnv;
}

/**
 * Runs an invocation to completion under the retry policy. Attempts are strictly sequential;
 * there is no timeout, so a hung toolchain holds the returned promise open.
 */
export class ProcessRunner {
  constructor(
    private readonly executor: Executor,
    private readonly options: ProcessRunnerOptions,
  ) {}

  /** scratchEnv is the resolver's choice; invocation.env wins over it. */
  async run(invocation: InvocationSpec, scratchEnv: Readonly<Record<string, string>> = {}): Promise<RunReport> {
    const env = this.composeEnv(scratchEnv, invocation.env);
    let state: RetryState = initialState(invocation.argv);
    let completed: AttemptState = state;
    let last: ExecResult | undefined;
    let lastLaunchError: EngineError | undefined;

    for (;;) {
      switch (state.kind) {
        case "attempt": {
          const attempt = state;
          const fullArgv = [this.options.binary, ...attempt.argv];
          logger.info({ argv: fullArgv, attempt: attempt.attempt }, "Executing toolchain command");
          try {
            last = await this.executor.execute({ argv: fullArgv, env, cwd: this.options.cwd });
            completed = attempt;
            logger.info({ exitCode: last.exitCode, durationMs: last.durationMs }, "Toolchain command finished");
            state = nextState(attempt, { kind: "exited", exitCode: last.exitCode, stderr: last.stderr }, this.options.policy);
          } catch (err) {
            if (!isEngineError(err, EngineErrorCode.LAUNCH_FAILED)) throw err;
            lastLaunchError = err;
            logger.error({ attempt: attempt.attempt, error: err.message }, "Toolchain command could not be started");
            state = nextState(attempt, { kind: "launch-error" }, this.options.policy);
          }
          if (state.kind === "attempt") {
            logger.warn({ attempt: state.attempt, maxAttempts: this.options.policy.maxAttempts }, "Retrying toolchain command");
          }
          break;
        }
        case "mutate-and-retry":
          logger.warn({ argv: state.argv }, "ctags failure detected, retrying without colour output");
          state = afterMutation(state);
          break;
        case "give-up":
        case "done":
          return this.finish(invocation.logicalCommand, state, completed, last, lastLaunchError);
      }
    }
  }

  private finish(
    logicalCommand: string,
    state: Extract<RetryState, { kind: "give-up" | "done" }>,
    completed: AttemptState,
    last: ExecResult | undefined,
    lastLaunchError: EngineError | undefined,
  ): RunReport {
    // A runner-level failure only when no attempt ever ran to exit.
    if (last === undefined) {
      throw lastLaunchError ?? new EngineError(EngineErrorCode.LAUNCH_FAILED, "Toolchain never started");
    }
    if (state.kind === "give-up") {
      logger.warn({ attempts: state.attempt }, "Transient failures exhausted the retry budget");
    }
    return {
      result: {
        logicalCommand,
        command: [this.options.binary, ...completed.argv].join(" "),
        success: last.exitCode === 0,
        stdout: last.stdout,
        stderr: last.stderr,
      },
      attempts: state.attempt,
      argv: completed.argv,
      exitCode: last.exitCode,
      exhausted: state.kind === "give-up",
    };
  }

  private composeEnv(
    scratchEnv: Readonly<Record<string, string>>,
    overrides: Readonly<Record<string, string>>,
  ): Record<string, string> {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(this.options.baseEnv ?? process.env)) {
      if (value !== undefined) env[key] = value;
    }
    if (!env.HOME) env.HOME = homedir();
    return { ...env, ...scratchEnv, ...overrides };
  }
}
