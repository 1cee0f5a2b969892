// Process boundary: every toolchain invocation passes through an Executor.
// LocalExecutor is the only production implementation; tests inject scripted executors.
// A child that could not be started is an EngineError(LAUNCH_FAILED), never an ExecResult.
import { execFile, type ExecFileException } from "node:child_process";
import { EngineError, EngineErrorCode } from "../shared/errors.js";

/** A fully resolved process invocation. argv[0] is the binary. */
export interface ProcessCommand {
  readonly argv: readonly string[];
  readonly env: Readonly<Record<string, string>>;
  readonly cwd?: string;
}

export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

export interface Executor {
  execute(command: ProcessCommand): Promise<ExecResult>;
}

/** Runs commands with child_process.execFile: no shell, no timeout. */
export class LocalExecutor implements Executor {
  async execute(command: ProcessCommand): Promise<ExecResult> {
    const [cmd, ...args] = command.argv;
    if (cmd === undefined) {
      throw new EngineError(EngineErrorCode.LAUNCH_FAILED, "Empty argument vector");
    }
    const start = performance.now();

    return new Promise<ExecResult>((resolve, reject) => {
      execFile(
        cmd,
        args,
        {
          cwd: command.cwd,
          // Verbose compiles print every compiler invocation; 10MB covers large cores.
          maxBuffer: 10 * 1024 * 1024,
          // Replace the environment wholesale: the caller has already merged process.env in.
          env: { ...command.env },
          encoding: "utf8",
        },
        (error, stdout, stderr) => {
          const durationMs = Math.round(performance.now() - start);
          if (error && isLaunchFailure(error)) {
            reject(
              new EngineError(EngineErrorCode.LAUNCH_FAILED, `Could not start ${cmd}: ${error.message}`, {
                binary: cmd,
                errno: error.code,
              }),
            );
            return;
          }
          resolve({
            stdout: stdout ?? "",
            stderr: error && typeof error.code !== "number" ? appendLine(stderr ?? "", error.message) : stderr ?? "",
            exitCode: exitCodeOf(error),
            durationMs,
          });
        },
      );
    });
  }
}

function isLaunchFailure(error: ExecFileException): boolean {
  return typeof error.syscall === "string" && error.syscall.startsWith("spawn");
}

function exitCodeOf(error: ExecFileException | null): number {
  if (!error) return 0;
  return typeof error.code === "number" ? error.code : 1;
}

function appendLine(text: string, line: string): string {
  if (!text) return line;
  return text.endsWith("\n") ? `${text}${line}` : `${text}\n${line}`;
}
