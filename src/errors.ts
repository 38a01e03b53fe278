/**
 * Typed failures surfaced to callers.
 *
 * Every caller-facing operation either resolves or rejects with an
 * AgentHostError; SessionApi turns those into `{ ok: false, error }`
 * envelopes so nothing escapes as an unhandled fault.
 */

export type AgentHostErrorCode =
  | "SPAWN_FAILED"
  | "CAPACITY_EXCEEDED"
  | "SESSION_NOT_FOUND"
  | "SESSION_NOT_ACTIVE"
  | "TIMEOUT"
  | "PROTOCOL_DECODE"
  | "TRANSPORT_IO"
  | "INVALID_REQUEST";

export class AgentHostError extends Error {
  constructor(
    message: string,
    public readonly code: AgentHostErrorCode,
    public readonly sessionId?: string,
  ) {
    super(message);
    this.name = "AgentHostError";
  }

  toJSON(): { code: AgentHostErrorCode; message: string; sessionId?: string } {
    return this.sessionId
      ? { code: this.code, message: this.message, sessionId: this.sessionId }
      : { code: this.code, message: this.message };
  }
}

export function spawnFailed(message: string, sessionId?: string): AgentHostError {
  return new AgentHostError(message, "SPAWN_FAILED", sessionId);
}

export function sessionNotFound(sessionId: string): AgentHostError {
  return new AgentHostError(`Session not found: ${sessionId}`, "SESSION_NOT_FOUND", sessionId);
}

export function sessionNotActive(sessionId: string, state: string): AgentHostError {
  return new AgentHostError(
    `Session ${sessionId} is not active (state=${state})`,
    "SESSION_NOT_ACTIVE",
    sessionId,
  );
}

export function timeoutError(message: string, sessionId?: string): AgentHostError {
  return new AgentHostError(message, "TIMEOUT", sessionId);
}

export function isAgentHostError(err: unknown): err is AgentHostError {
  return err instanceof AgentHostError;
}

/** Normalize anything thrown from I/O into an AgentHostError (TRANSPORT_IO by default). */
export function toAgentHostError(err: unknown, sessionId?: string): AgentHostError {
  if (err instanceof AgentHostError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new AgentHostError(message, "TRANSPORT_IO", sessionId);
}
