// Invocation builder: turns an OperationRequest into the argv the runner executes plus the
// logical command used as the cache key. Compile requests always get a --build-path; the
// derived directory is <workdir>/build_<project> and is created here so the tool can write to it.
import { mkdir } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { CompileRequest, InvocationSpec, OperationRequest, UploadRequest } from "../types/command.js";
import { EngineError, EngineErrorCode } from "../shared/errors.js";
import { tempDirOverrides } from "./environment.js";

export interface InvocationBuilderOptions {
  workdir: string;
  verboseCompile: boolean;
}

/** Name of the sketch's project directory, the unit arduino-cli compiles. */
export function projectNameOf(sketchPath: string): string {
  return basename(dirname(sketchPath));
}

export function defaultBuildPath(workdir: string, sketchPath: string): string {
  return join(workdir, `build_${projectNameOf(sketchPath)}`);
}

/** Cache key for compiles is stable across build-path and verbosity choices. */
export function compileLogicalCommand(sketchPath: string, fqbn?: string): string {
  const project = projectNameOf(sketchPath);
  return fqbn ? `compile -b ${fqbn} ${project}` : `compile ${project}`;
}

export class InvocationBuilder {
  constructor(private readonly options: InvocationBuilderOptions) {}

  async build(request: OperationRequest): Promise<InvocationSpec> {
    switch (request.operation) {
      case "compile":
        return this.buildCompile(request);
      case "upload":
        return plain(buildUploadArgv(request));
      case "board-list":
        return plain(["board", "list"]);
      case "board-listall":
        return plain(request.platformId ? ["board", "listall", request.platformId] : ["board", "listall"]);
      case "core-list":
        return plain(["core", "list"]);
      case "core-install":
        return plain(["core", "install", requireText(request.platformId, "platformId")]);
      case "core-update-index":
        return plain(["core", "update-index"]);
      case "config-init":
        return plain(["config", "init"]);
      case "config-add":
        return plain(["config", "add", requireText(request.key, "key"), requireText(request.value, "value")]);
      case "version":
        return plain(["version"]);
    }
  }

  private async buildCompile(request: CompileRequest): Promise<InvocationSpec> {
    const sketchPath = requireText(request.sketchPath, "sketchPath");
    const buildPath = request.buildPath ?? defaultBuildPath(this.options.workdir, sketchPath);
    await mkdir(buildPath, { recursive: true });

    const argv = ["compile", sketchPath];
    if (request.fqbn) argv.push("--fqbn", request.fqbn);
    argv.push("--build-path", buildPath);
    if (request.verbose ?? this.options.verboseCompile) argv.push("-v");

    return {
      logicalCommand: compileLogicalCommand(sketchPath, request.fqbn),
      argv,
      env: tempDirOverrides(buildPath),
      buildPath,
    };
  }
}

function buildUploadArgv(request: UploadRequest): string[] {
  const argv = ["upload", "-p", requireText(request.port, "port")];
  if (request.fqbn) argv.push("--fqbn", request.fqbn);
  if (request.inputFile) {
    argv.push("-i", request.inputFile);
  } else if (request.sketchPath) {
    argv.push(request.sketchPath);
  } else {
    throw new EngineError(EngineErrorCode.INVALID_REQUEST, "Upload needs either sketchPath or inputFile");
  }
  return argv;
}

function plain(argv: string[]): InvocationSpec {
  return { logicalCommand: argv.join(" "), argv, env: {} };
}

function requireText(value: string, field: string): string {
  if (!value || !value.trim()) {
    throw new EngineError(EngineErrorCode.INVALID_REQUEST, `Missing required parameter: ${field}`);
  }
  return value;
}
