/**
 * Result of a state machine transition: the new state, or why it was refused.
 */
export type TransitionResult<T> =
  | { ok: true; state: T; from: string; to: string }
  | { ok: false; error: string };

export const isTransitionOk = <T>(
  result: TransitionResult<T>,
): result is { ok: true; state: T; from: string; to: string } => result.ok;
