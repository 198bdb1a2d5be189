/**
 * Server test fixtures: a recording transport, roster characters and a fully
 * wired engine over the in-memory store.
 */

import type { RosterCharacter, ServerEvent } from "@shared/combat";
import { CombatEngine } from "../combat/CombatEngine";
import { CommandDispatcher } from "../combat/command-dispatcher";
import { RoomQueue } from "../combat/room-queue";
import { silentLogger } from "../logger";
import { NotificationRouter } from "../realtime/notification-router";
import type { HubSocket, HubTransport } from "../realtime/socket-transport";
import { MemoryCampaignStore } from "../store/memory-store";

export const CAMPAIGN_ID = "camp-1";

export class RecordingTransport implements HubTransport {
  sent: Array<{ group: string; event: ServerEvent }> = [];

  sendToGroup(group: string, event: ServerEvent): void {
    this.sent.push({ group, event });
  }

  types(): string[] {
    return this.sent.map((entry) => entry.event.type);
  }

  clear(): void {
    this.sent = [];
  }
}

/** In-process stand-in for a ws socket. */
export class FakeSocket implements HubSocket {
  sent: string[] = [];
  open = true;
  closedWith: { code?: number; reason?: string } | null = null;

  send(data: string): void {
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.open = false;
    this.closedWith = { code, reason };
  }

  isOpen(): boolean {
    return this.open;
  }

  events(): ServerEvent[] {
    return this.sent.map((data) => {
      const event: ServerEvent = JSON.parse(data);
      return event;
    });
  }

  types(): string[] {
    return this.events().map((event) => event.type);
  }
}

export function makeCharacter(overrides: Partial<RosterCharacter> = {}): RosterCharacter {
  return {
    id: "pc-thorin",
    name: "Thorin",
    kind: "PC",
    maxHp: 12,
    currentHp: 12,
    tempHp: 0,
    armorClass: 16,
    conditions: [],
    deathSaveSuccesses: 0,
    deathSaveFailures: 0,
    controllingPlayerId: "user-1",
    ...overrides,
  };
}

export function sequentialIds(prefix = "id"): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

export interface TestEngine {
  engine: CombatEngine;
  dispatcher: CommandDispatcher;
  store: MemoryCampaignStore;
  transport: RecordingTransport;
  router: NotificationRouter;
  queue: RoomQueue;
}

export function createTestEngine(roster: RosterCharacter[] = [makeCharacter()]): TestEngine {
  const store = new MemoryCampaignStore();
  store.seed(CAMPAIGN_ID, roster);
  const transport = new RecordingTransport();
  const router = new NotificationRouter(transport, silentLogger);
  const queue = new RoomQueue();
  const engine = new CombatEngine({
    roster: store,
    encounters: store,
    router,
    logger: silentLogger,
    queue,
    rollD20: () => 10,
    generateId: sequentialIds(),
  });
  const dispatcher = new CommandDispatcher(engine, router, silentLogger);
  return { engine, dispatcher, store, transport, router, queue };
}

/** Thorin (initiative 15) against a goblin (initiative 16). */
export async function startThorinVsGoblin(engine: CombatEngine): Promise<void> {
  const started = await engine.startCombat(CAMPAIGN_ID, {
    partyInitiatives: [{ characterId: "pc-thorin", initiative: 15 }],
    enemies: [{ id: "goblin", name: "Goblin", maxHp: 7, armorClass: 15, initiative: 16 }],
  });
  if (!started.ok) {
    throw new Error(`Could not start the fixture encounter: ${started.message}`);
  }
}
