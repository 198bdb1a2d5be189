import type { ServerEvent } from "@shared/combat";
import type { Logger } from "../logger";
import type { ConnectionRegistry } from "./connection-registry";

/** What the hub needs from a live socket; `ws` sockets are adapted to this. */
export interface HubSocket {
  send(data: string): void;
  close(code?: number, reason?: string): void;
  isOpen(): boolean;
}

/** Group-addressed delivery, the only thing the router depends on. */
export interface HubTransport {
  sendToGroup(group: string, event: ServerEvent): void;
}

export class SocketTransport implements HubTransport {
  private sockets = new Map<string, HubSocket>();

  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly logger: Logger
  ) {}

  attach(connectionId: string, socket: HubSocket): void {
    this.sockets.set(connectionId, socket);
  }

  detach(connectionId: string): void {
    this.sockets.delete(connectionId);
  }

  sendToConnection(connectionId: string, event: ServerEvent): void {
    const socket = this.sockets.get(connectionId);
    if (!socket) return;
    this.deliver(connectionId, socket, JSON.stringify(event), event.type);
  }

  sendToGroup(group: string, event: ServerEvent): void {
    const data = JSON.stringify(event);
    for (const connectionId of this.registry.membersOf(group)) {
      const socket = this.sockets.get(connectionId);
      if (socket) this.deliver(connectionId, socket, data, event.type);
    }
  }

  private deliver(connectionId: string, socket: HubSocket, data: string, type: string): void {
    if (!socket.isOpen()) return;
    try {
      socket.send(data);
    } catch (error) {
      // One dead socket must not stop delivery to the rest of the group
      this.logger.warn(`Failed to deliver ${type} to ${connectionId}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
