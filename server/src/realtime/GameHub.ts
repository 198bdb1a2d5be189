/**
 * Game Hub
 *
 * WebSocket session lifecycle for every campaign:
 * - a connection joins its campaign's role group plus the "all" group
 * - every new connection gets a full STATE_SYNC; there is no replay
 * - client messages are validated and routed to the command handlers
 * - players arriving or leaving are announced to the DM
 */

import type { IncomingMessage, Server as HttpServer } from "node:http";
import { randomUUID } from "node:crypto";
import { WebSocket, WebSocketServer } from "ws";
import type { RawData } from "ws";
import type { ClientMessage, CombatErrorCode, ConnectionParams, ServerEvent } from "@shared/combat";
import { clientMessageSchema, connectionParamsSchema, createServerEvent } from "@shared/combat";
import type { CombatEngine } from "../combat/CombatEngine";
import type { CommandDispatcher } from "../combat/command-dispatcher";
import type { HandlerContext } from "../combat/handlers";
import { handleCombatCommand, handleSubmitChoice, isCommandMessage } from "../combat/handlers";
import type { Logger } from "../logger";
import type { ConnectionRecord, ConnectionRegistry } from "./connection-registry";
import type { NotificationRouter } from "./notification-router";
import type { HubSocket, SocketTransport } from "./socket-transport";

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface GameHubDeps {
  registry: ConnectionRegistry;
  transport: SocketTransport;
  router: NotificationRouter;
  engine: CombatEngine;
  dispatcher: CommandDispatcher;
  logger: Logger;
  generateId?: () => string;
}

export interface HubConnection {
  connectionId: string;
  /** Settles once the initial STATE_SYNC has been sent */
  ready: Promise<void>;
  onMessage(raw: string): Promise<void>;
  onClose(): void;
}

// ═══════════════════════════════════════════════════════════════════════════
// WS ADAPTERS
// ═══════════════════════════════════════════════════════════════════════════

function adaptSocket(ws: WebSocket): HubSocket {
  return {
    send: (data) => ws.send(data),
    close: (code, reason) => ws.close(code, reason),
    isOpen: () => ws.readyState === WebSocket.OPEN,
  };
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

export function parseConnectionParams(
  searchParams: URLSearchParams
): { ok: true; value: ConnectionParams } | { ok: false; reason: string } {
  const parsed = connectionParamsSchema.safeParse({
    campaignId: searchParams.get("campaignId") ?? undefined,
    userId: searchParams.get("userId") ?? undefined,
    characterId: searchParams.get("characterId") ?? undefined,
    isDm: searchParams.get("isDm") ?? undefined,
  });
  if (!parsed.success) {
    return { ok: false, reason: "campaignId and userId are required" };
  }
  return { ok: true, value: parsed.data };
}

// ═══════════════════════════════════════════════════════════════════════════
// GAME HUB
// ═══════════════════════════════════════════════════════════════════════════

export class GameHub {
  private readonly registry: ConnectionRegistry;
  private readonly transport: SocketTransport;
  private readonly router: NotificationRouter;
  private readonly engine: CombatEngine;
  private readonly dispatcher: CommandDispatcher;
  private readonly logger: Logger;
  private readonly newId: () => string;

  constructor(deps: GameHubDeps) {
    this.registry = deps.registry;
    this.transport = deps.transport;
    this.router = deps.router;
    this.engine = deps.engine;
    this.dispatcher = deps.dispatcher;
    this.logger = deps.logger;
    this.newId = deps.generateId ?? randomUUID;
  }

  /**
   * Accept WebSocket upgrades on `path` of an existing HTTP server.
   */
  attach(server: HttpServer, path: string): WebSocketServer {
    const wss = new WebSocketServer({ server, path });

    wss.on("connection", (ws: WebSocket, request: IncomingMessage) => {
      const url = new URL(request.url ?? "/", "http://localhost");
      const params = parseConnectionParams(url.searchParams);
      if (!params.ok) {
        ws.close(1008, params.reason);
        return;
      }

      const connection = this.connect(adaptSocket(ws), params.value);
      ws.on("message", (data: RawData) => {
        void connection.onMessage(rawDataToString(data));
      });
      ws.on("close", () => connection.onClose());
      ws.on("error", (error: Error) => {
        this.logger.warn("Socket error", { connectionId: connection.connectionId, error: error.message });
      });
    });

    return wss;
  }

  /**
   * Register a new connection. Reconnecting clients come through here too,
   * with a fresh connection id.
   */
  connect(socket: HubSocket, params: ConnectionParams): HubConnection {
    const record: ConnectionRecord = {
      connectionId: this.newId(),
      campaignId: params.campaignId,
      userId: params.userId,
      characterId: params.characterId,
      isDm: params.isDm,
      connectedAt: new Date().toISOString(),
    };

    this.registry.join(record);
    this.transport.attach(record.connectionId, socket);
    this.logger.info("Connection joined", {
      connectionId: record.connectionId,
      campaignId: record.campaignId,
      role: record.isDm ? "dm" : "player",
    });

    if (!record.isDm && record.characterId) {
      this.router.notify(record.campaignId, "PLAYER_CONNECTED", {
        userId: record.userId,
        characterId: record.characterId,
        isOnline: true,
      });
    }

    const ready = this.sendStateSync(record.connectionId, record.campaignId);

    return {
      connectionId: record.connectionId,
      ready,
      onMessage: (raw) => this.handleRaw(socket, record.connectionId, raw),
      onClose: () => this.disconnect(record.connectionId),
    };
  }

  disconnect(connectionId: string): void {
    const record = this.registry.leave(connectionId);
    this.transport.detach(connectionId);
    if (!record) return;

    this.logger.info("Connection left", { connectionId, campaignId: record.campaignId });
    if (!record.isDm && record.characterId) {
      this.router.notify(record.campaignId, "PLAYER_DISCONNECTED", {
        userId: record.userId,
        characterId: record.characterId,
        isOnline: this.registry.isUserOnline(record.campaignId, record.userId),
      });
    }
  }

  /**
   * Pull the full campaign state and send it to one connection. Never rejects.
   */
  async sendStateSync(connectionId: string, campaignId: string, requestId?: string): Promise<void> {
    const snapshot = await this.engine.getSnapshot(campaignId);
    if (!snapshot.ok) {
      this.reply(connectionId, campaignId, "ERROR", { message: snapshot.message }, requestId);
      return;
    }
    this.reply(connectionId, campaignId, "STATE_SYNC", snapshot.value, requestId);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // MESSAGE HANDLING
  // ═══════════════════════════════════════════════════════════════════════════

  private async handleRaw(socket: HubSocket, connectionId: string, raw: string): Promise<void> {
    const session = this.registry.get(connectionId);
    if (!session) {
      socket.close(1008, "Session not found");
      return;
    }

    try {
      const envelope = clientMessageSchema.safeParse(JSON.parse(raw));
      if (!envelope.success) {
        this.reply(connectionId, session.campaignId, "ACTION_REJECTED", {
          reason: "Unrecognized message",
          code: "InvalidCommand",
        });
        return;
      }
      await this.handleMessage(session, envelope.data);
    } catch (error) {
      this.logger.error("Message handling error", {
        connectionId,
        error: error instanceof Error ? error.message : String(error),
      });
      this.reply(connectionId, session.campaignId, "ERROR", {
        message: error instanceof Error ? error.message : "Unknown error",
      });
    }
  }

  private async handleMessage(session: ConnectionRecord, message: ClientMessage): Promise<void> {
    const { type, payload, requestId } = message;

    if (type === "REQUEST_STATE") {
      await this.sendStateSync(session.connectionId, session.campaignId, requestId);
      return;
    }

    const ctx: HandlerContext = {
      session,
      dispatcher: this.dispatcher,
      router: this.router,
      reject: (reason: string, code: CombatErrorCode | "PermissionDenied") =>
        this.reply(session.connectionId, session.campaignId, "ACTION_REJECTED", { reason, code }, requestId),
    };

    if (type === "SUBMIT_CHOICE") {
      handleSubmitChoice(ctx, payload);
      return;
    }

    if (isCommandMessage(type)) {
      await handleCombatCommand(ctx, type, payload);
      return;
    }

    ctx.reject(`Unsupported message ${type}`, "InvalidCommand");
  }

  private reply<T extends "STATE_SYNC" | "ACTION_REJECTED" | "ERROR">(
    connectionId: string,
    campaignId: string,
    type: T,
    payload: ServerEvent<T>["payload"],
    requestId?: string
  ): void {
    this.transport.sendToConnection(connectionId, createServerEvent(type, campaignId, payload, requestId));
  }
}
