// Sketch-level workflows on top of the engine: compile with artifact discovery, upload of a
// sketch or a prebuilt hex file, and compile-then-upload.
import fs from "node:fs/promises";
import path from "node:path";
import type { ArduinoCliEngine } from "../engine.js";
import type { ResultSource } from "../types/command.js";
import type { ErrorCategory } from "../types/outcome.js";
import { errorLines, errorTextOf } from "../classify/classifier.js";
import { logger } from "../logger.js";

export const BINARY_EXTENSION = ".hex";

export interface CompileReport {
  success: boolean;
  buildDir: string;
  hexPath: string;
  error: string;
  errorCategory?: ErrorCategory;
  source?: ResultSource;
}

export interface UploadReport {
  success: boolean;
  command: string;
  error: string;
}

export interface CompileAndUploadReport {
  success: boolean;
  compileSuccess: boolean;
  uploadSuccess: boolean;
  buildDir: string;
  hexPath: string;
  command: string;
  error: string;
}

export async function compileSketch(
  engine: ArduinoCliEngine,
  params: { sketchPath: string; fqbn?: string },
): Promise<CompileReport> {
  const problem = await checkSketchFile(params.sketchPath);
  if (problem) {
    return { success: false, buildDir: "", hexPath: "", error: problem };
  }

  const outcome = await engine.buildAndRun({
    operation: "compile",
    sketchPath: params.sketchPath,
    fqbn: params.fqbn ?? engine.config.default_fqbn,
  });
  const buildDir = outcome.buildPath ?? "";

  if (!outcome.success) {
    return {
      success: false,
      buildDir,
      hexPath: "",
      error: failureText(outcome.result.stdout, outcome.result.stderr) || "Compilation failed with unknown error",
      errorCategory: outcome.errorCategory,
      source: outcome.source,
    };
  }

  let hexPath = outcome.artifactPath;
  if (!hexPath || !(await isFile(hexPath))) {
    hexPath = (await findArtifact(buildDir, BINARY_EXTENSION)) ?? "";
  }
  return { success: true, buildDir, hexPath, error: "", errorCategory: outcome.errorCategory, source: outcome.source };
}

export async function uploadSketch(
  engine: ArduinoCliEngine,
  params: { port: string; fqbn?: string; sketchPath?: string; hexPath?: string },
): Promise<UploadReport> {
  const fqbn = params.fqbn ?? engine.config.default_fqbn;
  const useHex = params.hexPath !== undefined && (await isFile(params.hexPath));

  if (!useHex) {
    if (params.hexPath && !params.sketchPath) {
      return { success: false, command: "", error: `Hex file not found: ${params.hexPath}` };
    }
    if (!params.sketchPath) {
      return { success: false, command: "", error: "Either sketchPath or hexPath is required" };
    }
    if (!(await isFile(params.sketchPath))) {
      return { success: false, command: "", error: `Sketch file not found: ${params.sketchPath}` };
    }
  }

  const outcome = await engine.buildAndRun({
    operation: "upload",
    port: params.port,
    fqbn,
    ...(useHex ? { inputFile: params.hexPath } : { sketchPath: params.sketchPath }),
  });
  return {
    success: outcome.success,
    command: outcome.result.command,
    error: outcome.success ? "" : errorTextOf(outcome.result),
  };
}

export async function compileAndUpload(
  engine: ArduinoCliEngine,
  params: { sketchPath: string; port: string; fqbn?: string },
): Promise<CompileAndUploadReport> {
  const compiled = await compileSketch(engine, params);
  if (!compiled.success) {
    return {
      success: false,
      compileSuccess: false,
      uploadSuccess: false,
      buildDir: compiled.buildDir,
      hexPath: compiled.hexPath,
      command: "",
      error: `Compilation failed: ${compiled.error}`,
    };
  }
  if (!compiled.hexPath) {
    return {
      success: false,
      compileSuccess: true,
      uploadSuccess: false,
      buildDir: compiled.buildDir,
      hexPath: "",
      command: "",
      error: `Compilation succeeded but no ${BINARY_EXTENSION} file was found for uploading`,
    };
  }

  const uploaded = await uploadSketch(engine, { port: params.port, fqbn: params.fqbn, hexPath: compiled.hexPath });
  return {
    success: uploaded.success,
    compileSuccess: true,
    uploadSuccess: uploaded.success,
    buildDir: compiled.buildDir,
    hexPath: compiled.hexPath,
    command: uploaded.command,
    error: uploaded.error,
  };
}

/** First file in dir with the given extension, by file name. */
export async function findArtifact(dir: string, extension: string): Promise<string | undefined> {
  if (!dir) return undefined;
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (err) {
    logger.warn({ dir, error: err instanceof Error ? err.message : String(err) }, "Could not scan build directory");
    return undefined;
  }
  const match = entries.sort().find((name) => name.endsWith(extension));
  return match ? path.join(dir, match) : undefined;
}

async function checkSketchFile(sketchPath: string): Promise<string | undefined> {
  if (!sketchPath.endsWith(".ino")) return `Sketch file must have .ino extension: ${sketchPath}`;
  let content: string;
  try {
    content = await fs.readFile(sketchPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return `Sketch file not found: ${sketchPath}`;
    return `Error reading sketch file: ${err instanceof Error ? err.message : String(err)}`;
  }
  return content.trim() ? undefined : "Sketch file is empty";
}

function failureText(stdout: string, stderr: string): string {
  if (stderr.trim()) return stderr;
  return errorLines(stdout).join("\n");
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}
