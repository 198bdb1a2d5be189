/**
 * Combat WebSocket Connection
 *
 * Connects a DM or player client to the campaign hub. Every routed event and
 * direct reply is delivered to a typed handler keyed by event type.
 */

import { randomUUID } from "node:crypto";
import { WebSocket } from "ws";
import type { RawData } from "ws";
import { z } from "zod";
import type { ClientMessageType, ServerEvent, ServerEventPayloads, ServerEventType } from "@shared/combat";

// ═══════════════════════════════════════════════════════════════════════════
// SERVER EVENTS
// ═══════════════════════════════════════════════════════════════════════════

const SERVER_EVENT_TYPES = [
  "STATE_SYNC",
  "ACTION_REJECTED",
  "ERROR",
  "COMBAT_STARTED",
  "TURN_ADVANCED",
  "CHARACTER_STATE_UPDATED",
  "DEATH_SAVE_UPDATED",
  "INITIATIVE_SET",
  "COMBATANT_ADDED",
  "COMBAT_ENDED",
  "PLAYER_CONNECTED",
  "PLAYER_DISCONNECTED",
  "READ_ALOUD_TEXT",
  "PLAYER_CHOICE_SUBMITTED",
  "PLAYER_CHOICES_PRESENTED",
  "ATMOSPHERE_PULSE",
  "PLAYER_ROLL_LOGGED",
  "SCENE_IMAGE_UPDATED",
  "NARRATIVE_ANCHOR_UPDATED",
  "GROUP_INSIGHT_TRIGGERED",
] as const satisfies readonly ServerEventType[];

const serverEnvelopeSchema = z.object({
  type: z.enum(SERVER_EVENT_TYPES),
  campaignId: z.string(),
  payload: z.record(z.unknown()),
  timestamp: z.string(),
  requestId: z.string().optional(),
});

/** Envelope check only; payload shapes are the hub's contract. */
export function isServerEvent(value: unknown): value is ServerEvent {
  return serverEnvelopeSchema.safeParse(value).success;
}

export type ServerEventHandlers = {
  [K in ServerEventType]?: (payload: ServerEventPayloads[K], event: ServerEvent<K>) => void;
};

export interface CombatSocketHandlers {
  events?: ServerEventHandlers;

  // Connection lifecycle
  onOpen?: () => void;
  onClose?: () => void;
  onConnectionError?: (error: Error) => void;
}

function dispatchEvent<T extends ServerEventType>(handlers: ServerEventHandlers, event: ServerEvent<T>): void {
  const handler = handlers[event.type];
  handler?.(event.payload, event);
}

// ═══════════════════════════════════════════════════════════════════════════
// TRANSPORT
// ═══════════════════════════════════════════════════════════════════════════

export interface SocketListeners {
  onOpen: () => void;
  onClose: () => void;
  onMessage: (data: string) => void;
  onError: (error: Error) => void;
}

export interface CombatSocketTransport {
  isOpen: () => boolean;
  send: (data: string) => void;
  close: () => void;
}

export type SocketFactory = (url: string, listeners: SocketListeners) => CombatSocketTransport;

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

export const wsSocketFactory: SocketFactory = (url, listeners) => {
  const ws = new WebSocket(url);
  ws.on("open", () => listeners.onOpen());
  ws.on("close", () => listeners.onClose());
  ws.on("error", (error: Error) => listeners.onError(error));
  ws.on("message", (data: RawData, isBinary: boolean) => {
    if (!isBinary) listeners.onMessage(rawDataToString(data));
  });

  return {
    isOpen: () => ws.readyState === WebSocket.OPEN,
    send: (data) => ws.send(data),
    close: () => ws.close(),
  };
};

// ═══════════════════════════════════════════════════════════════════════════
// CONNECTION UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export interface CombatSocketOptions {
  /** Hub origin, e.g. http://localhost:4000 */
  baseUrl: string;
  path?: string;
  userId: string;
  isDm: boolean;
  characterId?: string;
  socketFactory?: SocketFactory;
  generateId?: () => string;
}

export const buildCombatSocketUrl = (campaignId: string, options: CombatSocketOptions): string => {
  const url = new URL(options.path ?? "/ws", options.baseUrl);
  url.search = "";
  url.hash = "";
  if (url.protocol === "https:") url.protocol = "wss:";
  if (url.protocol === "http:") url.protocol = "ws:";

  url.searchParams.set("campaignId", campaignId);
  url.searchParams.set("userId", options.userId);
  url.searchParams.set("isDm", String(options.isDm));
  if (options.characterId) {
    url.searchParams.set("characterId", options.characterId);
  }
  return url.toString();
};

// ═══════════════════════════════════════════════════════════════════════════
// SOCKET CONNECTION
// ═══════════════════════════════════════════════════════════════════════════

export interface CombatSocketConnection {
  /** Returns the requestId, or null when the socket is not open */
  send: (type: ClientMessageType, payload?: Record<string, unknown>) => string | null;
  close: () => void;
  requestState: () => string | null;
  isConnected: () => boolean;
}

export const connectCombatSocket = (
  campaignId: string,
  handlers: CombatSocketHandlers,
  options: CombatSocketOptions
): CombatSocketConnection => {
  const factory = options.socketFactory ?? wsSocketFactory;
  const newId = options.generateId ?? randomUUID;

  const socket = factory(buildCombatSocketUrl(campaignId, options), {
    onOpen: () => handlers.onOpen?.(),
    onClose: () => handlers.onClose?.(),
    onError: (error) => handlers.onConnectionError?.(error),
    onMessage: (data) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(data);
      } catch (error) {
        console.warn("[CombatWS] Ignoring malformed message:", error);
        return;
      }
      if (!isServerEvent(parsed)) {
        console.warn("[CombatWS] Ignoring unrecognized message:", data);
        return;
      }

      if (parsed.type === "ACTION_REJECTED") {
        console.warn("[CombatWS] Action rejected:", parsed.payload);
      } else if (parsed.type === "ERROR") {
        console.error("[CombatWS] Server error:", parsed.payload);
      }
      dispatchEvent(handlers.events ?? {}, parsed);
    },
  });

  const send = (type: ClientMessageType, payload?: Record<string, unknown>): string | null => {
    if (!socket.isOpen()) {
      console.warn(`[CombatWS] Cannot send ${type} - socket not open`);
      return null;
    }
    const requestId = newId();
    socket.send(JSON.stringify({ type, payload: payload ?? {}, requestId }));
    return requestId;
  };

  return {
    send,
    close: () => socket.close(),
    requestState: () => send("REQUEST_STATE"),
    isConnected: () => socket.isOpen(),
  };
};

// ═══════════════════════════════════════════════════════════════════════════
// RECONNECTING SOCKET
// ═══════════════════════════════════════════════════════════════════════════

export interface ReconnectingCombatSocket extends CombatSocketConnection {
  reconnect: () => void;
}

export interface ReconnectOptions extends CombatSocketOptions {
  maxRetries?: number;
  retryDelay?: number;
  onReconnecting?: (attempt: number) => void;
}

/**
 * A reconnect is a fresh join: the hub sends nothing missed while away, so
 * every open asks for a full STATE_SYNC.
 */
export const createReconnectingCombatSocket = (
  campaignId: string,
  handlers: CombatSocketHandlers,
  options: ReconnectOptions
): ReconnectingCombatSocket => {
  const maxRetries = options.maxRetries ?? 5;
  const retryDelay = options.retryDelay ?? 2000;
  let connection: CombatSocketConnection | null = null;
  let retryCount = 0;
  let isClosedIntentionally = false;
  let retryTimer: ReturnType<typeof setTimeout> | null = null;
  let generation = 0;

  const connect = () => {
    retryTimer = null;
    const current = ++generation;
    connection = connectCombatSocket(
      campaignId,
      {
        ...handlers,
        onOpen: () => {
          retryCount = 0;
          connection?.requestState();
          handlers.onOpen?.();
        },
        onClose: () => {
          handlers.onClose?.();
          // A socket replaced by reconnect() must not schedule retries
          if (current !== generation) return;
          if (!isClosedIntentionally && retryCount < maxRetries) {
            retryCount++;
            options.onReconnecting?.(retryCount);
            retryTimer = setTimeout(connect, retryDelay * Math.pow(1.5, retryCount - 1));
          }
        },
      },
      options
    );
  };

  const cancelRetry = () => {
    if (retryTimer) {
      clearTimeout(retryTimer);
      retryTimer = null;
    }
  };

  connect();

  return {
    send: (type, payload) => connection?.send(type, payload) ?? null,
    close: () => {
      isClosedIntentionally = true;
      cancelRetry();
      connection?.close();
    },
    requestState: () => connection?.requestState() ?? null,
    isConnected: () => connection?.isConnected() ?? false,
    reconnect: () => {
      cancelRetry();
      const previous = connection;
      generation++;
      previous?.close();
      isClosedIntentionally = false;
      retryCount = 0;
      connect();
    },
  };
};
