import type { EventBus, Notifier, NotifierMessage } from "@collab/types";
import { createEvent, createTraceContext } from "./bus.js";
import type { Logger } from "./logger.js";

/**
 * Delivers handoffs as `handoff.notify` events targeted at the agent.
 * Subscribers filter on `targetAgent` to receive their own turn.
 */
export class BusNotifier implements Notifier {
  constructor(private readonly bus: EventBus) {}

  async send(message: NotifierMessage): Promise<boolean> {
    const event = createEvent("handoff.notify", message, createTraceContext(), message.target);
    await this.bus.publish(event);
    return true;
  }
}

/** Writes handoffs to the log. Used where no transport is configured. */
export class LogNotifier implements Notifier {
  constructor(private readonly logger: Logger) {}

  async send(message: NotifierMessage): Promise<boolean> {
    this.logger.info(message.subject, {
      sessionId: message.sessionId,
      target: message.target,
      role: message.role,
      body: message.body,
    });
    return true;
  }
}
