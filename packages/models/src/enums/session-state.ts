/**
 * Lifecycle of a one-shot device session. States only move forward;
 * `Done` and `Failed` are terminal.
 */
export enum SessionState {
  New = 'new',
  Connecting = 'connecting',
  Registered = 'registered',
  AwaitingResponse = 'awaiting_response',
  Done = 'done',
  Failed = 'failed',
}

const ORDER: Record<SessionState, number> = {
  [SessionState.New]: 0,
  [SessionState.Connecting]: 1,
  [SessionState.Registered]: 2,
  [SessionState.AwaitingResponse]: 3,
  [SessionState.Done]: 4,
  [SessionState.Failed]: 4,
};

export function isTerminalState(state: SessionState): boolean {
  return state === SessionState.Done || state === SessionState.Failed;
}

/**
 * Whether a session may move from `from` to `to`. Terminal states accept
 * no further transitions.
 */
export function canTransition(from: SessionState, to: SessionState): boolean {
  if (isTerminalState(from)) return false;
  return ORDER[to] > ORDER[from];
}
