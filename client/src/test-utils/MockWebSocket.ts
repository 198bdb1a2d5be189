/**
 * Mock WebSocket for combat socket tests
 *
 * Stands in for the hub connection. Tests drive server events and inspect
 * what the client sent.
 */

import type { ClientMessageType, ServerEventPayloads, ServerEventType } from "@shared/combat";
import type { CombatSocketTransport, SocketFactory, SocketListeners } from "../api/combatSocket";

export interface SentMessage {
  type: ClientMessageType;
  payload: Record<string, unknown>;
  requestId?: string;
}

export class MockWebSocket implements CombatSocketTransport {
  static instances: MockWebSocket[] = [];

  open = false;
  closed = false;
  readonly url: string;
  readonly sentMessages: SentMessage[] = [];

  constructor(url: string, private readonly listeners: SocketListeners, autoOpen: boolean) {
    this.url = url;
    MockWebSocket.instances.push(this);

    // Simulates the handshake completing after the caller has wired up
    if (autoOpen) {
      queueMicrotask(() => this.triggerOpen());
    }
  }

  isOpen(): boolean {
    return this.open;
  }

  send(data: string): void {
    if (!this.open) {
      throw new Error("WebSocket is not open");
    }
    this.sentMessages.push(JSON.parse(data));
  }

  close(): void {
    if (this.closed) return;
    this.open = false;
    this.closed = true;
    this.listeners.onClose();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // TEST HELPERS - Simulate server events
  // ═══════════════════════════════════════════════════════════════════════════

  triggerOpen(): void {
    if (this.closed) return;
    this.open = true;
    this.listeners.onOpen();
  }

  /** Server-side drop */
  triggerClose(): void {
    this.close();
  }

  triggerError(message: string): void {
    this.listeners.onError(new Error(message));
  }

  triggerRaw(data: string): void {
    this.listeners.onMessage(data);
  }

  triggerMessage<T extends ServerEventType>(
    type: T,
    payload: ServerEventPayloads[T],
    campaignId = "test-campaign",
    requestId?: string
  ): void {
    this.triggerRaw(
      JSON.stringify({
        type,
        campaignId,
        payload,
        timestamp: new Date().toISOString(),
        requestId,
      })
    );
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // STATIC HELPERS
  // ═══════════════════════════════════════════════════════════════════════════

  static getLatest(): MockWebSocket | undefined {
    return MockWebSocket.instances[MockWebSocket.instances.length - 1];
  }

  static reset(): void {
    MockWebSocket.instances = [];
  }

  static findMessagesByType(type: ClientMessageType): SentMessage[] {
    return MockWebSocket.instances.flatMap((ws) => ws.sentMessages).filter((m) => m.type === type);
  }
}

/**
 * Factory for `socketFactory`. Sockets open on the next microtask unless
 * `autoOpen` is false.
 */
export function mockSocketFactory(options: { autoOpen?: boolean } = {}): SocketFactory {
  return (url, listeners) => new MockWebSocket(url, listeners, options.autoOpen ?? true);
}
