// Output classification. Pure functions only: nothing here runs a process or touches disk.
// The failure table is ordered; the first matching rule wins, so when several phrases
// co-occur the more actionable diagnosis (linker, then dependency, then board) is chosen.
import type { CommandResult, OperationKind } from "../types/command.js";
import { ErrorCategory, type ClassifiedOutcome } from "../types/outcome.js";

export interface FailureRule {
  readonly category: ErrorCategory;
  readonly matches: (text: string, lower: string) => boolean;
}

export const FAILURE_RULES: readonly FailureRule[] = [
  {
    category: ErrorCategory.UndefinedReference,
    matches: (text) => text.includes("undefined reference"),
  },
  {
    category: ErrorCategory.MissingDependency,
    matches: (text, lower) =>
      text.includes("No such file or directory") || (lower.includes("library") && lower.includes("not found")),
  },
  {
    category: ErrorCategory.UnsupportedTarget,
    matches: (_text, lower) => lower.includes("board") && (lower.includes("unknown") || lower.includes("not found")),
  },
];

/** "Sketch uses ..." followed by a line naming a <sketch>.ino.<ext> artifact. */
const ARTIFACT_PATTERN = /Sketch uses [^\n]*\r?\n([^\r\n]*\.ino\.[^\r\n]*)\r?\n/;

export function categorizeFailure(text: string): ErrorCategory {
  const lower = text.toLowerCase();
  for (const rule of FAILURE_RULES) {
    if (rule.matches(text, lower)) return rule.category;
  }
  return ErrorCategory.SyntaxError;
}

export function extractArtifactPath(stdout: string): string {
  const match = ARTIFACT_PATTERN.exec(stdout);
  return match?.[1]?.trim() ?? "";
}

/** stderr is authoritative when it has content; otherwise stdout is searched. */
export function errorTextOf(result: Pick<CommandResult, "stdout" | "stderr">): string {
  return result.stderr.trim() ? result.stderr : result.stdout;
}

export function classify(result: CommandResult, operation: OperationKind): ClassifiedOutcome {
  if (result.success) {
    return {
      success: true,
      errorCategory: ErrorCategory.None,
      artifactPath: operation === "compile" ? extractArtifactPath(result.stdout) : "",
    };
  }
  return {
    success: false,
    errorCategory: categorizeFailure(errorTextOf(result)),
    artifactPath: "",
  };
}

/** Lines containing "error:", used when a failed run left stderr empty. */
export function errorLines(text: string): string[] {
  return text.split("\n").filter((line) => line.includes("error:"));
}
