export enum EngineErrorCode {
  LAUNCH_FAILED = "LAUNCH_FAILED",
  INVALID_REQUEST = "INVALID_REQUEST",
  CONFIG_INVALID = "CONFIG_INVALID",
  CACHE_IO = "CACHE_IO",
}

/** Failures of the engine itself; toolchain failures come back as results instead. */
export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: EngineErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "EngineError";
    this.code = code;
    this.context = context;
  }
}

/** Narrows `err`, optionally to one code. */
export function isEngineError(err: unknown, code?: EngineErrorCode): err is EngineError {
  return err instanceof EngineError && (code === undefined || err.code === code);
}
