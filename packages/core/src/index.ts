export { SessionController } from "./session-controller.js";
export type { SessionControllerOptions } from "./session-controller.js";
export { CollabSession } from "./collab-session.js";
export { AgentRegistry, AgentStatusSchema, AGENT_STATUSES } from "./agent-registry.js";
export type { AgentRegistryOptions, LockReleaser } from "./agent-registry.js";
export { LockManager } from "./lock-manager.js";
export type { LockManagerOptions } from "./lock-manager.js";
export { HistoryLog } from "./history-log.js";
export type { HistoryLogOptions } from "./history-log.js";
export { canTransition, isTerminal, systemClock } from "./session-state.js";
export type { Clock } from "./session-state.js";
export {
  CollabError,
  isCollabError,
  sessionNotFound,
  sessionTerminal,
  invalidTransition,
  agentNotFound,
  duplicateAgent,
  invalidStatus,
  storeError,
  configError,
} from "./errors.js";
export { createLogger, consoleSink } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";
export { loadCoordinatorConfig, parseCoordinatorConfig, CoordinatorConfigSchema, LogLevelSchema } from "./config.js";
export type { ConfigEnv } from "./config.js";
export { InMemoryEventBus, createEvent, createTraceContext } from "./bus.js";
export { BusNotifier, LogNotifier } from "./notifier.js";
