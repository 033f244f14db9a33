import type { AgentName, SessionId } from "./foundational.js";
import type { Agent } from "./session.js";

/** Payload handed to the notification transport on a handoff. */
export interface NotifierMessage {
  readonly sessionId: SessionId;
  readonly target: AgentName;
  readonly role: string;
  readonly subject: string;
  readonly body: string;
}

/**
 * Fire-and-forget message sink.
 * Resolves false (or rejects) when delivery failed; callers never roll back.
 */
export interface Notifier {
  send(message: NotifierMessage): Promise<boolean>;
}

export interface HandoffResult {
  /** The agent that was notified, absent when no agent holds the role. */
  readonly agent?: Agent;
  readonly delivered: boolean;
}
