// Scratch-directory resolution for a single invocation.
// Candidates are tried in a fixed order; the first one that exists (or can be created) and is
// writable becomes TMPDIR/TMP/TEMP for the child. No candidate is not an error: the toolchain
// then uses its own default, and any resulting temp-file failure goes through the retry loop.
import { mkdir, chmod, access } from "node:fs/promises";
import { constants } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { logger } from "../logger.js";

export const TEMP_DIR_VARIABLES = ["TMPDIR", "TMP", "TEMP"] as const;

export interface ScratchEnvironment {
  /** Undefined when every candidate failed. */
  readonly scratchDir?: string;
  readonly env: Readonly<Record<string, string>>;
}

/** Project-local scratch, hidden project-local scratch, then a per-user scratch dir. */
export function defaultScratchCandidates(workdir: string, home: string = homedir()): string[] {
  return [
    join(workdir, "arduino_cli_temp"),
    join(workdir, ".arduino_tmp"),
    join(home, ".arduino_cli_temp"),
  ];
}

export function tempDirOverrides(dir: string): Record<string, string> {
  const env: Record<string, string> = {};
  for (const name of TEMP_DIR_VARIABLES) env[name] = dir;
  return env;
}

export async function resolveScratchEnvironment(candidates: readonly string[]): Promise<ScratchEnvironment> {
  for (const dir of candidates) {
    if (await prepareCandidate(dir)) {
      logger.debug({ dir }, "Selected scratch directory");
      return { scratchDir: dir, env: tempDirOverrides(dir) };
    }
  }
  logger.warn({ candidates }, "No writable scratch directory; leaving temp variables untouched");
  return { env: {} };
}

async function prepareCandidate(dir: string): Promise<boolean> {
  try {
    const created = await mkdir(dir, { recursive: true });
    if (created !== undefined) {
      await chmod(dir, 0o755);
      logger.debug({ dir }, "Created scratch directory");
    }
    await access(dir, constants.W_OK);
    return true;
  } catch (err) {
    logger.warn({ dir, error: err instanceof Error ? err.message : String(err) }, "Scratch candidate unusable");
    return false;
  }
}
