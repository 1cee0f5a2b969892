export { ArduinoCliEngine, createEngine } from "./engine.js";
export type { EngineDeps, StoredOutput, CreateEngineOptions } from "./engine.js";
export type {
  CommandResult,
  InvocationSpec,
  OperationRequest,
  OperationKind,
  CompileRequest,
  UploadRequest,
  ResultSource,
} from "./types/command.js";
export { ErrorCategory } from "./types/outcome.js";
export type { ClassifiedOutcome, EngineOutcome } from "./types/outcome.js";
export type { EngineConfig } from "./types/config.js";
export { loadConfig, parseConfig, DEFAULT_CONFIG } from "./config/loader.js";
export { EngineError, EngineErrorCode, isEngineError } from "./shared/errors.js";
export { LocalExecutor } from "./execution/executor.js";
export type { Executor, ExecResult, ProcessCommand } from "./execution/executor.js";
export { ProcessRunner } from "./execution/runner.js";
export type { RunReport } from "./execution/runner.js";
export { InvocationBuilder } from "./execution/invocation.js";
export { resolveScratchEnvironment, defaultScratchCandidates } from "./execution/environment.js";
export { classify, categorizeFailure, extractArtifactPath } from "./classify/classifier.js";
export { diagnose } from "./classify/diagnostics.js";
export type { DiagnosticReport, DiagnosticIssue, DiagnosticKind } from "./classify/diagnostics.js";
export { ResultCache, NOT_EXECUTED_MESSAGE } from "./cache/result-cache.js";
export type { CommandCache } from "./cache/result-cache.js";
export { FileResultStore, MemoryResultStore, cacheKey } from "./cache/store.js";
export type { ResultStore } from "./cache/store.js";
export * from "./operations/sketch.js";
export * from "./operations/boards.js";
