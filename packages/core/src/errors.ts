import type { CollabErrorCode, CollabErrorInfo, SessionStatus } from "@collab/types";

/**
 * Base error class for every failure the coordinator surfaces.
 * Callers branch on `code`, never on the message.
 */
export class CollabError extends Error implements CollabErrorInfo {
  readonly code: CollabErrorCode;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(
    code: CollabErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "CollabError";
    this.code = code;
    this.details = details;
  }

  toJSON(): { name: string; code: CollabErrorCode; message: string; details: Readonly<Record<string, unknown>> } {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

export function isCollabError(err: unknown, code?: CollabErrorCode): err is CollabError {
  return err instanceof CollabError && (code === undefined || err.code === code);
}

// ─── Factories ──────────────────────────────────────────────────────

export function sessionNotFound(sessionId: string): CollabError {
  return new CollabError("SESSION_NOT_FOUND", `Session not found: ${sessionId}`, { sessionId });
}

export function sessionTerminal(sessionId: string, status: SessionStatus): CollabError {
  return new CollabError(
    "SESSION_TERMINAL",
    `Session ${sessionId} is ${status} and accepts no further changes`,
    { sessionId, status }
  );
}

export function invalidTransition(
  sessionId: string,
  from: SessionStatus,
  to: SessionStatus
): CollabError {
  return new CollabError(
    "INVALID_TRANSITION",
    `Session ${sessionId} cannot move from ${from} to ${to}`,
    { sessionId, from, to }
  );
}

export function agentNotFound(sessionId: string, agentName: string): CollabError {
  return new CollabError(
    "AGENT_NOT_FOUND",
    `Agent ${agentName} is not a member of session ${sessionId}`,
    { sessionId, agentName }
  );
}

export function duplicateAgent(sessionId: string, agentName: string): CollabError {
  return new CollabError(
    "DUPLICATE_AGENT",
    `Agent ${agentName} already joined session ${sessionId}`,
    { sessionId, agentName }
  );
}

export function invalidStatus(status: string, allowed: readonly string[]): CollabError {
  return new CollabError(
    "INVALID_STATUS",
    `Unrecognized agent status "${status}" (expected one of: ${allowed.join(", ")})`,
    { status, allowed }
  );
}

export function storeError(operation: string, cause: unknown): CollabError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new CollabError("STORE_ERROR", `Store failure during ${operation}: ${reason}`, { operation }, cause);
}

export function configError(message: string, details: Record<string, unknown> = {}): CollabError {
  return new CollabError("CONFIG_ERROR", message, details);
}
