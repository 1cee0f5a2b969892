import type { CommandResult, OperationKind, ResultSource } from "./command.js";

export enum ErrorCategory {
  None = "None",
  SyntaxError = "SyntaxError",
  UndefinedReference = "UndefinedReference",
  MissingDependency = "MissingDependency",
  UnsupportedTarget = "UnsupportedTarget",
}

export interface ClassifiedOutcome {
  readonly success: boolean;
  readonly errorCategory: ErrorCategory;
  /** Empty when the tool's output did not name an artifact. */
  readonly artifactPath: string;
}

/** What buildAndRun hands back: the classification plus the result it was derived from. */
export interface EngineOutcome extends ClassifiedOutcome {
  readonly operation: OperationKind;
  readonly logicalCommand: string;
  readonly result: CommandResult;
  readonly source: ResultSource;
  readonly attempts: number;
  readonly buildPath?: string;
}
