// Compiler-error explanation. Independent of classify(): this never changes a result's
// ErrorCategory, it only turns raw compiler text into issues and remediation hints.

export type DiagnosticKind = "missing-include" | "undefined-reference" | "syntax";

export interface DiagnosticIssue {
  readonly kind: DiagnosticKind;
  /** The source line that triggered the issue, trimmed. */
  readonly line: string;
  /** Header file or symbol the issue is about, when one could be extracted. */
  readonly subject?: string;
}

export interface DiagnosticReport {
  readonly issues: DiagnosticIssue[];
  readonly headers: string[];
  readonly symbols: string[];
  readonly suggestions: string[];
}

const MISSING_INCLUDE = /fatal error:\s*([\w./+-]+\.(?:h|hpp|hh)):\s*No such file or directory/;
const UNDEFINED_REFERENCE = /undefined reference to [`'"‘]([^`'"’]+)[`'"’]/;
const COMPILER_ERROR = /\berror:\s*(.+)$/;

export function diagnose(text: string): DiagnosticReport {
  const issues: DiagnosticIssue[] = [];
  const headers: string[] = [];
  const symbols: string[] = [];

  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (!line) continue;

    const include = MISSING_INCLUDE.exec(line);
    if (include?.[1]) {
      issues.push({ kind: "missing-include", line, subject: include[1] });
      pushUnique(headers, include[1]);
      continue;
    }
    const reference = UNDEFINED_REFERENCE.exec(line);
    if (reference?.[1]) {
      issues.push({ kind: "undefined-reference", line, subject: reference[1] });
      pushUnique(symbols, reference[1]);
      continue;
    }
    if (COMPILER_ERROR.test(line)) {
      issues.push({ kind: "syntax", line });
    }
  }

  return { issues, headers, symbols, suggestions: suggest(issues, headers, symbols) };
}

function suggest(issues: readonly DiagnosticIssue[], headers: readonly string[], symbols: readonly string[]): string[] {
  const suggestions: string[] = [];
  for (const header of headers) {
    const libraryName = header.replace(/\.[^.]+$/, "");
    suggestions.push(
      `Install the library that provides ${header} (try: arduino-cli lib search ${libraryName}), then check the #include spelling.`,
    );
  }
  for (const symbol of symbols) {
    suggestions.push(
      `Define '${symbol}' or install the library that implements it; make sure its signature matches the declaration.`,
    );
  }
  if (issues.some((issue) => issue.kind === "syntax")) {
    suggestions.push("Check the reported lines for missing semicolons, unbalanced brackets or misspelled identifiers.");
  }
  return suggestions;
}

function pushUnique(list: string[], value: string): void {
  if (!list.includes(value)) list.push(value);
}
