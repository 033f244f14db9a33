/**
 * Machine-readable failure codes.
 * Lock contention is not an error; acquire reports it as `false`.
 */
export type CollabErrorCode =
  | "SESSION_TERMINAL"     // Mutation attempted on a completed/cancelled session
  | "INVALID_TRANSITION"   // Illegal session status change
  | "SESSION_NOT_FOUND"    // Referenced session does not exist
  | "AGENT_NOT_FOUND"      // Agent is not a member of the session
  | "DUPLICATE_AGENT"      // Agent name already present in the session
  | "INVALID_STATUS"       // Unrecognized agent status value
  | "STORE_ERROR"          // Underlying persistence failure (rolled back)
  | "CONFIG_ERROR";        // Configuration file missing fields or malformed

export interface CollabErrorInfo {
  readonly code: CollabErrorCode;
  readonly message: string;
  readonly details: Readonly<Record<string, unknown>>;
  /** The original error, if wrapping a lower-level failure. */
  readonly cause?: unknown;
}
