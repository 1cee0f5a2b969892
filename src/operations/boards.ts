import type { ArduinoCliEngine } from "../engine.js";
import type { CommandResult } from "../types/command.js";
import { errorTextOf } from "../classify/classifier.js";
import { EngineError, EngineErrorCode } from "../shared/errors.js";

export interface BoardInfo {
  port: string;
  boardName: string;
  fqbn: string;
}

export interface InstallReport {
  success: boolean;
  message: string;
}

export type VersionReport = { success: true; version: string } | { success: false; error: string };

export interface AvailableBoards {
  connected: BoardInfo[];
  platforms: string[];
  allBoards: string;
}

/** Short names people type for well-known platforms. */
const PLATFORM_ALIASES: Readonly<Record<string, string>> = { esp32: "esp32:esp32" };

const FQBN_TOKEN = /^[\w.-]+:[\w.-]+:[\w.-]+/;

/** Data rows of an arduino-cli table (header dropped, blank lines skipped). */
function tableRows(output: string): string[] {
  const lines = output.trim().split("\n");
  return lines.slice(1).map((line) => line.trim()).filter((line) => line.length > 0);
}

/**
 * Columns: Port, Protocol, Type..., Board Name..., FQBN, Core. Type and name are free text, so the
 * FQBN is located as the last vendor:arch:board token and everything between is the name.
 */
export function parseBoardList(output: string): BoardInfo[] {
  return tableRows(output).map((row) => {
    const parts = row.split(/\s+/);
    let fqbnIndex = -1;
    parts.forEach((part, index) => {
      if (FQBN_TOKEN.test(part)) fqbnIndex = index;
    });
    return {
      port: parts[0] ?? "",
      boardName: parts.slice(2, fqbnIndex === -1 ? undefined : fqbnIndex).join(" "),
      fqbn: fqbnIndex === -1 ? "" : parts[fqbnIndex] ?? "",
    };
  });
}

export function parseCoreList(output: string): string[] {
  return tableRows(output).map((row) => row.split(/\s+/)[0] ?? "").filter(Boolean);
}

export function normalizePlatformId(platformId: string): string {
  const id = PLATFORM_ALIASES[platformId] ?? platformId;
  if (!/^[\w.-]+:[\w.-]+$/.test(id)) {
    throw new EngineError(EngineErrorCode.INVALID_REQUEST, `Platform id must look like vendor:arch, got "${platformId}"`);
  }
  return id;
}

export async function listConnectedBoards(engine: ArduinoCliEngine): Promise<BoardInfo[]> {
  const { result } = await engine.buildAndRun({ operation: "board-list" });
  return result.success && result.stdout ? parseBoardList(result.stdout) : [];
}

export async function listCorePlatforms(engine: ArduinoCliEngine): Promise<string[]> {
  const { result } = await engine.buildAndRun({ operation: "core-list" });
  return result.success && result.stdout ? parseCoreList(result.stdout) : [];
}

export async function installBoard(engine: ArduinoCliEngine, platformId: string): Promise<InstallReport> {
  const id = normalizePlatformId(platformId);

  if ((await listCorePlatforms(engine)).includes(id)) {
    return { success: true, message: `Platform ${id} is already installed` };
  }

  const update = await engine.buildAndRun({ operation: "core-update-index" });
  if (!update.success) {
    return { success: false, message: `Failed to update index: ${errorTextOf(update.result)}` };
  }

  const install = await engine.buildAndRun({ operation: "core-install", platformId: id });
  if (!install.success) {
    return { success: false, message: `Failed to install ${id}: ${errorTextOf(install.result)}` };
  }

  if (!(await listCorePlatforms(engine)).includes(id)) {
    return { success: false, message: `Installation command succeeded but ${id} not found in installed platforms` };
  }
  return { success: true, message: `Successfully installed ${id}` };
}

export async function checkVersion(engine: ArduinoCliEngine): Promise<VersionReport> {
  const { result } = await engine.buildAndRun({ operation: "version" });
  return result.success
    ? { success: true, version: result.stdout.trim() }
    : { success: false, error: errorTextOf(result) };
}

export async function listAvailableBoards(engine: ArduinoCliEngine): Promise<AvailableBoards> {
  const connected = await listConnectedBoards(engine);
  const platforms = await listCorePlatforms(engine);
  const { result } = await engine.buildAndRun({ operation: "board-listall" });
  return { connected, platforms, allBoards: result.success ? result.stdout : "" };
}

/** Register an extra board-manager index URL. Runs config init first and stops if it fails. */
export async function addBoardUrl(engine: ArduinoCliEngine, url: string): Promise<CommandResult> {
  const init = await engine.buildAndRun({ operation: "config-init" });
  if (!init.success) return init.result;
  const added = await engine.buildAndRun({ operation: "config-add", key: "board_manager.additional_urls", value: url });
  return added.result;
}
