// Retry policy as an explicit state machine.
//
//   attempt(n) --exit 0-----------------------------> done
//   attempt(n) --exit != 0, no transient match-------> done
//   attempt(n) --transient, n = max------------------> give-up
//   attempt(n) --transient + ctags, flag missing-----> mutate-and-retry --> attempt(n + 1, argv + flag)
//   attempt(n) --transient---------------------------> attempt(n + 1)
//   attempt(n) --launch error, n < max---------------> attempt(n + 1)
//   attempt(n) --launch error, n = max---------------> give-up
//
// The argv mutation is carried in the state, so it persists for every later attempt of the call.

/** stderr text of arduino-cli when its own temp-file handling breaks. */
export const TRANSIENT_SIGNATURE = "temporary file";
/** ctags preprocessing failures respond to running without colour output. */
export const CTAGS_SIGNATURE = "ctags";
export const NO_COLOR_FLAG = "--no-color";

export interface RetryPolicy {
  readonly maxAttempts: number;
}

export type RetryState =
  | { readonly kind: "attempt"; readonly attempt: number; readonly argv: readonly string[] }
  | { readonly kind: "mutate-and-retry"; readonly attempt: number; readonly argv: readonly string[] }
  | { readonly kind: "give-up"; readonly attempt: number }
  | { readonly kind: "done"; readonly attempt: number };

export type AttemptState = Extract<RetryState, { kind: "attempt" }>;

export type AttemptObservation =
  | { readonly kind: "exited"; readonly exitCode: number; readonly stderr: string }
  | { readonly kind: "launch-error" };

export function initialState(argv: readonly string[]): AttemptState {
  return { kind: "attempt", attempt: 1, argv };
}

export function isTransientFailure(exitCode: number, stderr: string): boolean {
  return exitCode !== 0 && stderr.includes(TRANSIENT_SIGNATURE);
}

export function nextState(state: AttemptState, observation: AttemptObservation, policy: RetryPolicy): RetryState {
  const exhausted = state.attempt >= policy.maxAttempts;

  if (observation.kind === "launch-error") {
    return exhausted
      ? { kind: "give-up", attempt: state.attempt }
      : { kind: "attempt", attempt: state.attempt + 1, argv: state.argv };
  }

  if (!isTransientFailure(observation.exitCode, observation.stderr)) {
    return { kind: "done", attempt: state.attempt };
  }
  if (exhausted) {
    return { kind: "give-up", attempt: state.attempt };
  }
  if (observation.stderr.includes(CTAGS_SIGNATURE) && !state.argv.includes(NO_COLOR_FLAG)) {
    return { kind: "mutate-and-retry", attempt: state.attempt, argv: [...state.argv, NO_COLOR_FLAG] };
  }
  return { kind: "attempt", attempt: state.attempt + 1, argv: state.argv };
}

/** The only transition out of mutate-and-retry. */
export function afterMutation(state: Extract<RetryState, { kind: "mutate-and-retry" }>): AttemptState {
  return { kind: "attempt", attempt: state.attempt + 1, argv: state.argv };
}
