import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { CampaignSnapshot } from "@shared/combat";
import {
  buildCombatSocketUrl,
  connectCombatSocket,
  createReconnectingCombatSocket,
  isServerEvent,
} from "../api/combatSocket";
import { MockWebSocket, mockSocketFactory } from "../test-utils/MockWebSocket";

const SNAPSHOT: CampaignSnapshot = { campaignId: "test-campaign", encounter: null, roster: [] };

function options(overrides: { autoOpen?: boolean } = {}) {
  let next = 0;
  return {
    baseUrl: "http://localhost:4000",
    userId: "user-1",
    isDm: false,
    characterId: "pc-thorin",
    socketFactory: mockSocketFactory(overrides),
    generateId: () => `req-${++next}`,
  };
}

function latest(): MockWebSocket {
  const socket = MockWebSocket.getLatest();
  if (!socket) throw new Error("No socket was created");
  return socket;
}

describe("buildCombatSocketUrl", () => {
  it("switches to ws and carries the connection parameters", () => {
    expect(buildCombatSocketUrl("camp 1", options())).toBe(
      "ws://localhost:4000/ws?campaignId=camp+1&userId=user-1&isDm=false&characterId=pc-thorin"
    );
  });

  it("uses wss for https origins", () => {
    const url = buildCombatSocketUrl("camp-1", { ...options(), baseUrl: "https://table.test", path: "/live", isDm: true });
    expect(url).toBe("wss://table.test/live?campaignId=camp-1&userId=user-1&isDm=true&characterId=pc-thorin");
  });
});

describe("isServerEvent", () => {
  it("accepts a logged roll", () => {
    expect(
      isServerEvent({
        type: "PLAYER_ROLL_LOGGED",
        campaignId: "c",
        payload: { id: "roll-1", characterId: "pc-thorin", result: 14 },
        timestamp: "2026-01-01T00:00:00.000Z",
      })
    ).toBe(true);
  });

  it("accepts a hub envelope", () => {
    expect(
      isServerEvent({ type: "COMBAT_ENDED", campaignId: "c", payload: {}, timestamp: "2026-01-01T00:00:00.000Z" })
    ).toBe(true);
  });

  it("rejects unknown event types", () => {
    expect(isServerEvent({ type: "NOPE", campaignId: "c", payload: {}, timestamp: "t" })).toBe(false);
  });
});

describe("connectCombatSocket", () => {
  beforeEach(() => {
    MockWebSocket.reset();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("delivers each event to its typed handler", () => {
    const onStateSync = vi.fn();
    const onTurnAdvanced = vi.fn();
    connectCombatSocket(
      "test-campaign",
      { events: { STATE_SYNC: onStateSync, TURN_ADVANCED: onTurnAdvanced } },
      options({ autoOpen: false })
    );

    const socket = latest();
    socket.triggerMessage("STATE_SYNC", SNAPSHOT);
    socket.triggerMessage("TURN_ADVANCED", { newTurnIndex: 1, currentCombatantId: "pc-thorin", roundNumber: 2 });

    expect(onStateSync).toHaveBeenCalledTimes(1);
    expect(onStateSync.mock.calls[0][0]).toEqual(SNAPSHOT);
    expect(onTurnAdvanced.mock.calls[0][0]).toEqual({
      newTurnIndex: 1,
      currentCombatantId: "pc-thorin",
      roundNumber: 2,
    });
  });

  it("ignores malformed and unknown messages", () => {
    const onError = vi.fn();
    connectCombatSocket("test-campaign", { events: { ERROR: onError } }, options({ autoOpen: false }));

    const socket = latest();
    socket.triggerRaw("{oops");
    socket.triggerRaw(JSON.stringify({ type: "MYSTERY", payload: {} }));
    expect(onError).not.toHaveBeenCalled();
  });

  it("sends messages with a request id once open", () => {
    const connection = connectCombatSocket("test-campaign", {}, options({ autoOpen: false }));
    const socket = latest();

    expect(connection.send("ADVANCE_TURN")).toBeNull();
    socket.triggerOpen();

    expect(connection.send("APPLY_DAMAGE", { combatantId: "goblin", amount: 3 })).toBe("req-1");
    expect(socket.sentMessages).toEqual([
      { type: "APPLY_DAMAGE", payload: { combatantId: "goblin", amount: 3 }, requestId: "req-1" },
    ]);
    expect(connection.isConnected()).toBe(true);
  });

  it("reports connection errors", () => {
    const onConnectionError = vi.fn();
    connectCombatSocket("test-campaign", { onConnectionError }, options({ autoOpen: false }));
    latest().triggerError("ECONNREFUSED");
    expect(onConnectionError.mock.calls[0][0]).toEqual(new Error("ECONNREFUSED"));
  });
});

describe("createReconnectingCombatSocket", () => {
  beforeEach(() => {
    MockWebSocket.reset();
    vi.useFakeTimers();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("asks for the full state every time it opens", async () => {
    const socket = createReconnectingCombatSocket("test-campaign", {}, options());
    await Promise.resolve();
    expect(MockWebSocket.findMessagesByType("REQUEST_STATE")).toHaveLength(1);

    latest().triggerClose();
    vi.advanceTimersByTime(2000);
    await Promise.resolve();

    expect(MockWebSocket.instances).toHaveLength(2);
    expect(MockWebSocket.findMessagesByType("REQUEST_STATE")).toHaveLength(2);
    expect(socket.isConnected()).toBe(true);
    socket.close();
  });

  it("backs off between attempts and gives up after the limit", () => {
    const onReconnecting = vi.fn();
    createReconnectingCombatSocket("test-campaign", {}, {
      ...options({ autoOpen: false }),
      maxRetries: 2,
      retryDelay: 1000,
      onReconnecting,
    });

    latest().triggerClose();
    expect(onReconnecting).toHaveBeenLastCalledWith(1);
    vi.advanceTimersByTime(999);
    expect(MockWebSocket.instances).toHaveLength(1);
    vi.advanceTimersByTime(1);
    expect(MockWebSocket.instances).toHaveLength(2);

    latest().triggerClose();
    expect(onReconnecting).toHaveBeenLastCalledWith(2);
    vi.advanceTimersByTime(1500);
    expect(MockWebSocket.instances).toHaveLength(3);

    latest().triggerClose();
    vi.advanceTimersByTime(10_000);
    expect(MockWebSocket.instances).toHaveLength(3);
    expect(onReconnecting).toHaveBeenCalledTimes(2);
  });

  it("stays closed after close()", () => {
    const socket = createReconnectingCombatSocket("test-campaign", {}, options({ autoOpen: false }));
    socket.close();
    vi.advanceTimersByTime(60_000);
    expect(MockWebSocket.instances).toHaveLength(1);
  });

  it("replaces the socket on reconnect() without scheduling a retry", () => {
    const socket = createReconnectingCombatSocket("test-campaign", {}, options({ autoOpen: false }));
    socket.reconnect();
    vi.advanceTimersByTime(60_000);
    expect(MockWebSocket.instances).toHaveLength(2);
    expect(MockWebSocket.instances[0].closed).toBe(true);
  });
});
