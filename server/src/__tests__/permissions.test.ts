import { describe, expect, it } from "vitest";
import { canIssueCommand, canSubmitChoice } from "../combat/handlers";
import type { ConnectionRecord } from "../realtime/connection-registry";

const player: ConnectionRecord = {
  connectionId: "conn-1",
  campaignId: "camp-1",
  userId: "user-1",
  characterId: "pc-thorin",
  isDm: false,
  connectedAt: "2026-01-01T00:00:00.000Z",
};

const dm: ConnectionRecord = { ...player, connectionId: "conn-dm", userId: "dm-1", characterId: null, isDm: true };

describe("canIssueCommand", () => {
  it("lets the DM run anything", () => {
    expect(canIssueCommand(dm, { name: "end_combat" })).toBe(true);
  });

  it("lets a player roll their own death save", () => {
    expect(canIssueCommand(player, { name: "record_death_save", characterId: "pc-thorin", roll: 12 })).toBe(true);
  });

  it("stops a player rolling for someone else", () => {
    expect(canIssueCommand(player, { name: "record_death_save", characterId: "pc-elara", roll: 12 })).toBe(false);
  });

  it("keeps DM commands away from players", () => {
    expect(
      canIssueCommand(player, { name: "apply_damage", combatantId: "goblin", amount: 3, critical: false })
    ).toBe(false);
  });
});

describe("canSubmitChoice", () => {
  it("is for players only", () => {
    expect(canSubmitChoice(player)).toBe(true);
    expect(canSubmitChoice(dm)).toBe(false);
  });
});
