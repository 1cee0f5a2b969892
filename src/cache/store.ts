// Durable storage behind ResultCache. One JSON record per key; writes overwrite whole records.
// The file store takes no locks: concurrent writers to one key race and the last rename wins.
import fs from "node:fs/promises";
import path from "node:path";
import { createHash, randomUUID } from "node:crypto";
import { z } from "zod";
import type { CommandResult } from "../types/command.js";
import { EngineError, EngineErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface ResultStore {
  read(key: string): Promise<CommandResult | undefined>;
  write(key: string, result: CommandResult): Promise<void>;
}

const StoredRecordSchema = z.object({
  logicalCommand: z.string(),
  command: z.string(),
  success: z.boolean(),
  stdout: z.string(),
  stderr: z.string(),
});

/** Stable across processes, unlike an in-memory hash. */
export function cacheKey(logicalCommand: string): string {
  return createHash("sha256").update(logicalCommand, "utf8").digest("hex");
}

export class FileResultStore implements ResultStore {
  constructor(private readonly dir: string) {}

  recordPath(key: string): string {
    return path.join(this.dir, `${key}.json`);
  }

  async read(key: string): Promise<CommandResult | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.recordPath(key), "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return undefined;
      throw err;
    }
    try {
      const parsed = StoredRecordSchema.parse(JSON.parse(raw));
      return {
        logicalCommand: parsed.logicalCommand,
        command: parsed.command, success: parsed.success,
        stdout: parsed.stdout,
        stderr: parsed.stderr,
      };
    } catch (err) {
      // An unreadable record is indistinguishable from "never executed" for callers.
      logger.warn({ key, error: err instanceof Error ? err.message : String(err) }, "Ignoring corrupt result record");
      return undefined;
    }
  }

  async write(key: string, result: CommandResult): Promise<void> {
    const target = this.recordPath(key);
    // Unique per write so concurrent writers to one key never share a temp file.
    const tmp = `${target}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(tmp, JSON.stringify({ ...result, savedAt: new Date().toISOString() }, null, 2), "utf-8");
      await fs.rename(tmp, target);
    } catch (err) {
      throw new EngineError(EngineErrorCode.CACHE_IO, `Could not write result record ${target}`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

/** Store that lives only as long as the process; for tests and cache-less setups. */
export class MemoryResultStore implements ResultStore {
  private readonly records = new Map<string, CommandResult>();

  async read(key: string): Promise<CommandResult | undefined> {
    return this.records.get(key);
  }

  async write(key: string, result: CommandResult): Promise<void> {
    this.records.set(key, { ...result });
  }

  get size(): number {
    return this.records.size;
  }
}
