/**
 * Notification Router
 *
 * Maps each event type to its fixed audience and hands the envelope to the
 * transport. Stateless; delivery is fire-and-forget and a transport failure
 * never reaches the caller.
 */

import type { RoutedEventType, ServerEventPayloads } from "@shared/combat";
import { EVENT_AUDIENCE, createServerEvent } from "@shared/combat";
import type { Logger } from "../logger";
import { groupName } from "./connection-registry";
import type { HubTransport } from "./socket-transport";

export class NotificationRouter {
  constructor(
    private readonly transport: HubTransport,
    private readonly logger: Logger
  ) {}

  notify<T extends RoutedEventType>(campaignId: string, type: T, payload: ServerEventPayloads[T]): void {
    const group = groupName(campaignId, EVENT_AUDIENCE[type]);
    const event = createServerEvent(type, campaignId, payload);
    try {
      this.transport.sendToGroup(group, event);
      this.logger.debug(`${type} -> ${group}`);
    } catch (error) {
      this.logger.warn(`Broadcast of ${type} to ${group} failed`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
