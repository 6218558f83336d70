export type TurnErrorCode =
  | "upstream_unavailable"
  | "turn_in_progress"
  | "session_not_found"
  | "session_closed"
  | "state_invariant";

export class TurnError extends Error {
  readonly retryable: boolean;

  constructor(
    readonly code: TurnErrorCode,
    message: string,
    opts: { retryable?: boolean; cause?: unknown } = {},
  ) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.retryable = opts.retryable ?? false;
  }
}

/** The model or the section search failed or ran out of time. */
export class UpstreamUnavailableError extends TurnError {
  constructor(readonly upstream: "llm" | "search", message: string, cause?: unknown) {
    super("upstream_unavailable", message, { retryable: true, cause });
  }
}

export class TurnInProgressError extends TurnError {
  constructor(readonly sessionId: string) {
    super("turn_in_progress", `A turn is already running for session ${sessionId}`);
  }
}

export class SessionNotFoundError extends TurnError {
  constructor(readonly sessionId: string) {
    super("session_not_found", `Unknown session ${sessionId}`);
  }
}

export class SessionClosedError extends TurnError {
  constructor(
    readonly sessionId: string,
    readonly status: string,
  ) {
    super("session_closed", `Session ${sessionId} has ended (${status})`);
  }
}

/** A mutation that cannot be applied at all. Nothing from the batch is kept. */
export class StateInvariantError extends TurnError {
  constructor(message: string) {
    super("state_invariant", message);
  }
}

export function isTurnError(err: unknown): err is TurnError {
  return err instanceof TurnError;
}
