/**
 * Outcome of one toolchain invocation (or a stored stand-in for one).
 * `command` is the full command line as text; `logicalCommand` is the cache key it belongs to.
 */
export interface CommandResult {
  readonly logicalCommand: string;
  readonly command: string;
  readonly success: boolean;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * A structured invocation ready for the runner. argv excludes the binary itself.
 * Built fresh per call and never mutated after handoff.
 */
export interface InvocationSpec {
  readonly logicalCommand: string;
  readonly argv: readonly string[];
  readonly env: Readonly<Record<string, string>>;
  /** Set for compile-style operations: where artifacts land. */
  readonly buildPath?: string;
}

export type CompileRequest = {
  operation: "compile";
  sketchPath: string;
  fqbn?: string;
  buildPath?: string;
  verbose?: boolean;
};

export type UploadRequest = {
  operation: "upload";
  port: string;
  fqbn?: string;
  sketchPath?: string;
  inputFile?: string;
};

/** Every operation the invocation builder knows how to express. */
export type OperationRequest =
  | CompileRequest
  | UploadRequest
  | { operation: "board-list" }
  | { operation: "board-listall"; platformId?: string }
  | { operation: "core-list" }
  | { operation: "core-install"; platformId: string }
  | { operation: "core-update-index" }
  | { operation: "config-init" }
  | { operation: "config-add"; key: string; value: string }
  | { operation: "version" };

export type OperationKind = OperationRequest["operation"];

/** Where a returned result came from. */
export type ResultSource = "executed" | "cache-fallback";
