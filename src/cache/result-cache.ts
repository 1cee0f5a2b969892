// Result cache: an in-memory map in front of a durable ResultStore.
// Reads check memory first, then the store. The two may diverge (the store outlives the process),
// and absence from both means "not yet executed", never failure.
import type { CommandResult } from "../types/command.js";
import { logger } from "../logger.js";
import { cacheKey, type ResultStore } from "./store.js";

export const NOT_EXECUTED_MESSAGE =
  "Command not yet executed. Run it with arduino-cli first, then store its output with storeResult so it can be served from here.";

export interface CommandCache {
  save(logicalCommand: string, result: CommandResult): Promise<void>;
  get(logicalCommand: string): Promise<CommandResult | undefined>;
  getOrReportUnexecuted(logicalCommand: string): Promise<CommandResult>;
}

export class ResultCache implements CommandCache {
  private readonly memory = new Map<string, CommandResult>();

  constructor(
    private readonly store: ResultStore,
    private readonly binary: string = "arduino-cli",
  ) {}

  /** Last write wins: both layers are overwritten unconditionally. */
  async save(logicalCommand: string, result: CommandResult): Promise<void> {
    const key = cacheKey(logicalCommand);
    this.memory.set(key, result);
    await this.store.write(key, result);
    logger.debug({ logicalCommand, key, success: result.success }, "Saved command result");
  }

  async get(logicalCommand: string): Promise<CommandResult | undefined> {
    const key = cacheKey(logicalCommand);
    const inMemory = this.memory.get(key);
    if (inMemory) return inMemory;

    let stored: CommandResult | undefined;
    try {
      stored = await this.store.read(key);
    } catch (err) {
      // The durable layer is optional; an unreadable store reads as a miss.
      logger.warn({ logicalCommand, key, error: err instanceof Error ? err.message : String(err) }, "Result store read failed");
      return undefined;
    }
    if (stored) {
      this.memory.set(key, stored);
      logger.debug({ logicalCommand, key }, "Loaded command result from durable store");
    }
    return stored;
  }

  /** Never throws for a miss: absence comes back as a failed sentinel result. */
  async getOrReportUnexecuted(logicalCommand: string): Promise<CommandResult> {
    const cached = await this.get(logicalCommand);
    if (cached) return cached;
    return {
      logicalCommand,
      command: `${this.binary} ${logicalCommand}`,
      success: false,
      stdout: "",
      stderr: NOT_EXECUTED_MESSAGE,
    };
  }

  /** Drop the in-memory layer only; the durable store is untouched. */
  clearMemory(): void {
    this.memory.clear();
  }
}
