/**
 * Combat Engine
 *
 * Server-authoritative encounter state machine. Every operation runs inside
 * the campaign's room queue: load once, validate, mutate, write roster then
 * encounter, and only then broadcast.
 */

import { randomUUID } from "node:crypto";
import type {
  CampaignSnapshot,
  CombatFailure,
  CombatResult,
  CombatantSetup,
  CombatantSnapshot,
  CombatantAddedPayload,
  D20Roller,
  Encounter,
  EncounterView,
  InitiativeSetPayload,
  NewCombatant,
  PartyMemberSetup,
  PlayerRollLoggedPayload,
  RollOutcome,
  RosterCharacter,
  StartCombatInput,
  TurnAdvancedPayload,
  VitalEvent,
} from "@shared/combat";
import {
  adjustSnapshotHp,
  advanceEncounterTurn,
  applyVitalEvent,
  bumpVersion,
  createEncounter,
  decodeEncounter,
  failure,
  insertCombatant,
  isCharacterDefeated,
  isDead,
  isDying,
  isPlayerCharacter,
  isStable,
  markSnapshotDefeated,
  reconcileWithRoster,
  replaceCombatant,
  resolveInitiative,
  rollD20,
  setCombatantInitiative,
  snapshotFromRoster,
  success,
  syncSnapshotWithRoster,
  toCombatantView,
  toEncounterView,
} from "@shared/combat";
import type { Logger } from "../logger";
import type { NotificationRouter } from "../realtime/notification-router";
import type { EncounterStore, RosterStore } from "../store/types";
import { RoomQueue } from "./room-queue";
import type { WritePlan } from "./write-through";
import { writeThrough } from "./write-through";

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface CombatEngineDeps {
  roster: RosterStore;
  encounters: EncounterStore;
  router: NotificationRouter;
  logger: Logger;
  queue?: RoomQueue;
  rollD20?: D20Roller;
  generateId?: () => string;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

export interface DamageOptions extends OperationOptions {
  critical?: boolean;
}

export interface PlayerRollInput {
  characterId: string;
  checkType: string;
  result: number;
  outcome: RollOutcome;
}

/** Result of any HP/condition/death-save mutation. */
export interface VitalsUpdate {
  combatantId: string;
  currentHp: number;
  maxHp: number;
  isDefeated: boolean;
  /** Roster entry after the change; null for encounter-only combatants */
  character: RosterCharacter | null;
}

type Loaded = CombatResult<Encounter | null>;

function isInteger(value: number): boolean {
  return Number.isInteger(value);
}

function sameConditions(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((condition, index) => condition === b[index]);
}

function cancelled(operation: string): CombatFailure {
  return failure("Cancelled", `${operation} was cancelled before anything was written`);
}

function validateSetupAmounts(setup: CombatantSetup): CombatFailure | null {
  if (!isInteger(setup.maxHp) || setup.maxHp < 1) {
    return failure("InvalidAmount", `${setup.name}: maxHp must be a positive integer`);
  }
  const currentHp = setup.currentHp ?? setup.maxHp;
  if (!isInteger(currentHp) || currentHp < 0 || currentHp > setup.maxHp) {
    return failure("InvalidAmount", `${setup.name}: currentHp must be between 0 and ${setup.maxHp}`);
  }
  if (!isInteger(setup.armorClass) || setup.armorClass < 0) {
    return failure("InvalidAmount", `${setup.name}: armorClass must be a non-negative integer`);
  }
  return null;
}

// ═══════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════

export class CombatEngine {
  private readonly roster: RosterStore;
  private readonly encounters: EncounterStore;
  private readonly router: NotificationRouter;
  private readonly logger: Logger;
  private readonly queue: RoomQueue;
  private readonly roll: D20Roller;
  private readonly newId: () => string;

  constructor(deps: CombatEngineDeps) {
    this.roster = deps.roster;
    this.encounters = deps.encounters;
    this.router = deps.router;
    this.logger = deps.logger;
    this.queue = deps.queue ?? new RoomQueue();
    this.roll = deps.rollD20 ?? rollD20;
    this.newId = deps.generateId ?? randomUUID;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  startCombat(
    campaignId: string,
    input: StartCombatInput,
    options: OperationOptions = {}
  ): Promise<CombatResult<EncounterView>> {
    return this.inRoom(campaignId, "start_combat", options, async () => {
      const existing = await this.loadActive(campaignId);
      if (!existing.ok) return existing;
      if (existing.value) {
        return failure("AlreadyActive", "An encounter is already running in this campaign");
      }

      if (input.partyInitiatives.length + input.enemies.length === 0) {
        return failure("InvalidState", "An encounter needs at least one combatant");
      }

      const roster = new Map((await this.roster.listCharacters(campaignId)).map((c) => [c.id, c]));
      const combatants: Record<string, CombatantSnapshot> = {};
      const surprisedIds: string[] = [];

      for (const entry of input.partyInitiatives) {
        const character = roster.get(entry.characterId);
        if (!character) {
          return failure("UnknownCombatant", `No roster character ${entry.characterId}`);
        }
        if (combatants[character.id]) {
          return failure("InvalidState", `${character.id} is listed twice`);
        }
        const initiative = resolveInitiative(entry.initiative, entry.initiativeModifier, this.roll);
        combatants[character.id] = snapshotFromRoster(character, initiative, entry.tiebreaker ?? 0);
        if (entry.surprised) surprisedIds.push(character.id);
      }

      for (const setup of input.enemies) {
        const invalid = validateSetupAmounts(setup);
        if (invalid) return invalid;
        const id = setup.id ?? this.newId();
        if (combatants[id]) {
          return failure("InvalidState", `${id} is listed twice`);
        }
        combatants[id] = this.snapshotFromSetup(setup);
        if (setup.surprised) surprisedIds.push(id);
      }

      const encounter = createEncounter(this.newId(), combatants, surprisedIds);
      const failed = await this.commit(campaignId, "start_combat", options, { encounter });
      if (failed) return failed;

      const view = toEncounterView(encounter);
      this.logger.info("Combat started", { campaignId, encounterId: encounter.id, combatants: encounter.turnOrder.length });
      this.router.notify(campaignId, "COMBAT_STARTED", view);
      return success(view);
    });
  }

  endCombat(campaignId: string, options: OperationOptions = {}): Promise<CombatResult<{ encounterId: string | null }>> {
    return this.inRoom(campaignId, "end_combat", options, async () => {
      // Read raw so that a corrupt encounter can still be ended
      const raw = await this.encounters.loadEncounter(campaignId);
      if (raw === null) {
        return failure("NoActiveCombat", "There is no encounter to end");
      }
      const decoded = decodeEncounter(raw);

      const failed = await this.commit(campaignId, "end_combat", options, { clearEncounter: true });
      if (failed) return failed;

      const encounterId = decoded.ok ? decoded.encounter.id : null;
      this.logger.info("Combat ended", { campaignId, encounterId });
      this.router.notify(campaignId, "COMBAT_ENDED", {});
      return success({ encounterId });
    });
  }

  addCombatant(
    campaignId: string,
    entry: NewCombatant,
    options: OperationOptions = {}
  ): Promise<CombatResult<CombatantAddedPayload>> {
    if (entry.kind === "PC") {
      return this.addPartyMember(campaignId, entry, options);
    }
    const setup: CombatantSetup = entry;
    const invalid = validateSetupAmounts(setup);
    if (invalid) return Promise.resolve(invalid);

    return this.inRoom(campaignId, "add_combatant", options, async () => {
      const loaded = await this.requireActive(campaignId);
      if (!loaded.ok) return loaded;

      const id = setup.id ?? this.newId();
      if (loaded.value.combatants[id]) {
        return failure("InvalidState", `${id} is already in the encounter`);
      }
      return this.commitNewCombatant(campaignId, options, loaded.value, id, this.snapshotFromSetup(setup), setup.surprised);
    });
  }

  /**
   * DM override: the combatant stays in the turn order and is skipped from
   * now on. Marking someone already out is a no-op.
   */
  markDefeated(campaignId: string, combatantId: string, options: OperationOptions = {}): Promise<CombatResult<VitalsUpdate>> {
    return this.inRoom(campaignId, "mark_defeated", options, async () => {
      const loaded = await this.requireActive(campaignId);
      if (!loaded.ok) return loaded;

      const snapshot = loaded.value.combatants[combatantId];
      if (!snapshot) {
        return failure("UnknownCombatant", `${combatantId} is not in the encounter`);
      }
      const character = isPlayerCharacter(snapshot) ? await this.roster.getCharacter(campaignId, combatantId) : null;
      if (snapshot.isDefeated) {
        return success({
          combatantId,
          currentHp: snapshot.currentHp,
          maxHp: snapshot.maxHp,
          isDefeated: true,
          character,
        });
      }

      const updated = markSnapshotDefeated(snapshot);
      const encounter = bumpVersion(replaceCombatant(loaded.value, combatantId, updated));
      const failed = await this.commit(campaignId, "mark_defeated", options, { encounter });
      if (failed) return failed;

      this.logger.info("Combatant marked defeated", { campaignId, combatantId });
      if (updated.currentHp !== snapshot.currentHp) {
        this.router.notify(campaignId, "CHARACTER_STATE_UPDATED", {
          characterId: combatantId,
          key: "currentHp",
          value: updated.currentHp,
        });
      }
      this.router.notify(campaignId, "CHARACTER_STATE_UPDATED", {
        characterId: combatantId,
        key: "isDefeated",
        value: true,
      });
      return success({
        combatantId,
        currentHp: updated.currentHp,
        maxHp: updated.maxHp,
        isDefeated: true,
        character,
      });
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Turns
  // ─────────────────────────────────────────────────────────────────────────

  advanceTurn(campaignId: string, options: OperationOptions = {}): Promise<CombatResult<TurnAdvancedPayload>> {
    return this.inRoom(campaignId, "advance_turn", options, async () => {
      const loaded = await this.requireActive(campaignId);
      if (!loaded.ok) return loaded;

      const { encounter: advanced, newRoundStarted } = advanceEncounterTurn(loaded.value);
      const encounter = bumpVersion(advanced);
      const failed = await this.commit(campaignId, "advance_turn", options, { encounter });
      if (failed) return failed;

      const payload: TurnAdvancedPayload = {
        newTurnIndex: encounter.currentTurnIndex,
        currentCombatantId: encounter.turnOrder[encounter.currentTurnIndex],
        roundNumber: encounter.roundNumber,
      };
      if (newRoundStarted) {
        this.logger.debug("Round started", { campaignId, round: encounter.roundNumber });
      }
      this.router.notify(campaignId, "TURN_ADVANCED", payload);
      return success(payload);
    });
  }

  setInitiative(
    campaignId: string,
    combatantId: string,
    value: number,
    options: OperationOptions = {}
  ): Promise<CombatResult<InitiativeSetPayload>> {
    if (!isInteger(value)) {
      return Promise.resolve(failure("InvalidAmount", "Initiative must be an integer"));
    }

    return this.inRoom(campaignId, "set_initiative", options, async () => {
      const loaded = await this.requireActive(campaignId);
      if (!loaded.ok) return loaded;
      if (!loaded.value.combatants[combatantId]) {
        return failure("UnknownCombatant", `${combatantId} is not in the encounter`);
      }

      const encounter = bumpVersion(setCombatantInitiative(loaded.value, combatantId, value));
      const failed = await this.commit(campaignId, "set_initiative", options, { encounter });
      if (failed) return failed;

      const payload: InitiativeSetPayload = {
        combatantId,
        initiative: value,
        turnOrder: encounter.turnOrder,
        currentTurnIndex: encounter.currentTurnIndex,
      };
      this.router.notify(campaignId, "INITIATIVE_SET", payload);
      return success(payload);
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Vitals
  // ─────────────────────────────────────────────────────────────────────────

  applyDamage(
    campaignId: string,
    combatantId: string,
    amount: number,
    options: DamageOptions = {}
  ): Promise<CombatResult<VitalsUpdate>> {
    if (!isInteger(amount) || amount < 0) {
      return Promise.resolve(failure("InvalidAmount", "Damage must be a non-negative integer"));
    }
    return this.applyToCombatant(campaignId, combatantId, "apply_damage", options, {
      type: "damage",
      amount,
      critical: options.critical ?? false,
    });
  }

  applyHealing(
    campaignId: string,
    combatantId: string,
    amount: number,
    options: OperationOptions = {}
  ): Promise<CombatResult<VitalsUpdate>> {
    if (!isInteger(amount) || amount < 0) {
      return Promise.resolve(failure("InvalidAmount", "Healing must be a non-negative integer"));
    }
    return this.applyToCombatant(campaignId, combatantId, "apply_healing", options, {
      type: "healing",
      amount,
    });
  }

  recordDeathSave(
    campaignId: string,
    characterId: string,
    roll: number,
    options: OperationOptions = {}
  ): Promise<CombatResult<VitalsUpdate>> {
    if (!isInteger(roll) || roll < 1 || roll > 20) {
      return Promise.resolve(failure("InvalidAmount", "A death save is a d20 roll between 1 and 20"));
    }

    return this.inRoom(campaignId, "record_death_save", options, async () => {
      const character = await this.roster.getCharacter(campaignId, characterId);
      if (!character) {
        return failure("UnknownCombatant", `No roster character ${characterId}`);
      }
      if (!isPlayerCharacter(character)) {
        return failure("InvalidState", `${character.name} does not make death saves`);
      }
      if (!isDying(character)) {
        return failure("InvalidState", `${character.name} is not dying`);
      }

      const loaded = await this.loadActive(campaignId);
      if (!loaded.ok) return loaded;

      const next = applyVitalEvent(character, { type: "death_save", roll });
      return this.commitCharacter(campaignId, "record_death_save", options, loaded.value, character, next);
    });
  }

  setCondition(
    campaignId: string,
    characterId: string,
    condition: string,
    active: boolean,
    options: OperationOptions = {}
  ): Promise<CombatResult<VitalsUpdate>> {
    const name = condition.trim();
    if (!name) {
      return Promise.resolve(failure("InvalidCommand", "Condition name is empty"));
    }

    return this.inRoom(campaignId, "set_condition", options, async () => {
      const character = await this.roster.getCharacter(campaignId, characterId);
      if (!character) {
        return failure("UnknownCombatant", `No roster character ${characterId}`);
      }
      const loaded = await this.loadActive(campaignId);
      if (!loaded.ok) return loaded;

      const conditions = active
        ? character.conditions.includes(name)
          ? character.conditions
          : [...character.conditions, name]
        : character.conditions.filter((c) => c !== name);

      const next: RosterCharacter = { ...character, conditions };
      return this.commitCharacter(campaignId, "set_condition", options, loaded.value, character, next);
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Rolls
  // ─────────────────────────────────────────────────────────────────────────

  /** Announces a check result to the table. Nothing is stored. */
  logPlayerRoll(
    campaignId: string,
    roll: PlayerRollInput,
    options: OperationOptions = {}
  ): Promise<CombatResult<PlayerRollLoggedPayload>> {
    if (!isInteger(roll.result)) {
      return Promise.resolve(failure("InvalidAmount", "A roll result must be an integer"));
    }

    return this.inRoom(campaignId, "log_player_roll", options, async () => {
      const character = await this.roster.getCharacter(campaignId, roll.characterId);
      const payload: PlayerRollLoggedPayload = {
        id: this.newId(),
        characterId: roll.characterId,
        characterName: character?.name ?? null,
        checkType: roll.checkType,
        result: roll.result,
        outcome: roll.outcome,
        rolledAt: new Date().toISOString(),
      };
      this.logger.info("Roll logged", {
        campaignId,
        characterId: roll.characterId,
        checkType: roll.checkType,
        result: roll.result,
        outcome: roll.outcome,
      });
      this.router.notify(campaignId, "PLAYER_ROLL_LOGGED", payload);
      return success(payload);
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Reads
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Full state for (re)synchronizing a client. Runs in the room queue so it
   * always reflects a completed operation.
   */
  getSnapshot(campaignId: string): Promise<CombatResult<CampaignSnapshot>> {
    return this.inRoom(campaignId, "get_snapshot", {}, async () => {
      const loaded = await this.loadActive(campaignId);
      // A corrupt encounter has been force-ended by now; report the state after that
      const encounter = loaded.ok ? loaded.value : null;
      const roster = await this.roster.listCharacters(campaignId);
      return success({
        campaignId,
        encounter: encounter ? toEncounterView(encounter) : null,
        roster,
      });
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════════

  private inRoom<T>(
    campaignId: string,
    operation: string,
    options: OperationOptions,
    body: () => Promise<CombatResult<T>>
  ): Promise<CombatResult<T>> {
    return this.queue.run(campaignId, async () => {
      if (options.signal?.aborted) return cancelled(operation);
      try {
        return await body();
      } catch (error) {
        this.logger.error(`${operation} failed`, {
          campaignId,
          error: error instanceof Error ? error.message : String(error),
        });
        return failure("StorageUnavailable", `${operation} could not read campaign state`);
      }
    });
  }

  /**
   * Load, decode and reconcile the encounter. A record that fails its
   * invariants is force-ended here and reported as CorruptEncounter.
   */
  private async loadActive(campaignId: string): Promise<Loaded> {
    const raw = await this.encounters.loadEncounter(campaignId);
    if (raw === null) return success(null);

    const decoded = decodeEncounter(raw);
    if (!decoded.ok) {
      await this.forceEnd(campaignId, decoded.reason);
      return failure("CorruptEncounter", `The stored encounter was unreadable and has been ended: ${decoded.reason}`);
    }

    const roster = await this.roster.listCharacters(campaignId);
    return success(reconcileWithRoster(decoded.encounter, roster));
  }

  private async requireActive(campaignId: string): Promise<CombatResult<Encounter>> {
    const loaded = await this.loadActive(campaignId);
    if (!loaded.ok) return loaded;
    if (!loaded.value) {
      return failure("NoActiveCombat", "No encounter is running in this campaign");
    }
    return success(loaded.value);
  }

  private async forceEnd(campaignId: string, reason: string): Promise<void> {
    this.logger.error("Stored encounter is corrupt; ending it", { campaignId, reason });
    try {
      await this.encounters.clearEncounter(campaignId);
    } catch (error) {
      this.logger.error("Could not clear the corrupt encounter", {
        campaignId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    this.router.notify(campaignId, "COMBAT_ENDED", {});
  }

  /** Last cancellation point, then the ordered writes. */
  private async commit(
    campaignId: string,
    operation: string,
    options: OperationOptions,
    plan: WritePlan
  ): Promise<CombatFailure | null> {
    if (options.signal?.aborted) return cancelled(operation);
    return writeThrough({ roster: this.roster, encounters: this.encounters }, campaignId, plan, this.logger);
  }

  private addPartyMember(
    campaignId: string,
    entry: PartyMemberSetup,
    options: OperationOptions
  ): Promise<CombatResult<CombatantAddedPayload>> {
    return this.inRoom(campaignId, "add_combatant", options, async () => {
      const loaded = await this.requireActive(campaignId);
      if (!loaded.ok) return loaded;

      const character = await this.roster.getCharacter(campaignId, entry.characterId);
      if (!character) {
        return failure("UnknownCombatant", `No roster character ${entry.characterId}`);
      }
      if (loaded.value.combatants[character.id]) {
        return failure("InvalidState", `${character.id} is already in the encounter`);
      }

      const initiative = resolveInitiative(entry.initiative, entry.initiativeModifier, this.roll);
      const snapshot = snapshotFromRoster(character, initiative, entry.tiebreaker ?? 0);
      return this.commitNewCombatant(campaignId, options, loaded.value, character.id, snapshot, entry.surprised);
    });
  }

  private async commitNewCombatant(
    campaignId: string,
    options: OperationOptions,
    current: Encounter,
    id: string,
    snapshot: CombatantSnapshot,
    surprised: boolean | undefined
  ): Promise<CombatResult<CombatantAddedPayload>> {
    const encounter = bumpVersion(insertCombatant(current, id, snapshot, surprised ?? false));
    const failed = await this.commit(campaignId, "add_combatant", options, { encounter });
    if (failed) return failed;

    const combatant = toCombatantView(encounter, id);
    if (!combatant) {
      return failure("UnknownCombatant", `${id} vanished while being added`);
    }
    const payload: CombatantAddedPayload = {
      combatant,
      turnOrder: encounter.turnOrder,
      currentTurnIndex: encounter.currentTurnIndex,
    };
    this.logger.info("Combatant added", { campaignId, combatantId: id, kind: snapshot.kind });
    this.router.notify(campaignId, "COMBATANT_ADDED", payload);
    return success(payload);
  }

  private snapshotFromSetup(setup: CombatantSetup): CombatantSnapshot {
    const currentHp = setup.currentHp ?? setup.maxHp;
    return {
      name: setup.name,
      kind: setup.kind ?? "Enemy",
      initiative: resolveInitiative(setup.initiative, setup.initiativeModifier, this.roll),
      tiebreaker: setup.tiebreaker ?? 0,
      currentHp,
      maxHp: setup.maxHp,
      armorClass: setup.armorClass,
      isDefeated: currentHp === 0,
    };
  }

  private applyToCombatant(
    campaignId: string,
    combatantId: string,
    operation: string,
    options: OperationOptions,
    event: Extract<VitalEvent, { type: "damage" | "healing" }>
  ): Promise<CombatResult<VitalsUpdate>> {
    return this.inRoom(campaignId, operation, options, async () => {
      const loaded = await this.requireActive(campaignId);
      if (!loaded.ok) return loaded;
      const encounter = loaded.value;

      const snapshot = encounter.combatants[combatantId];
      if (!snapshot) {
        return failure("UnknownCombatant", `${combatantId} is not in the encounter`);
      }

      if (isPlayerCharacter(snapshot)) {
        const character = await this.roster.getCharacter(campaignId, combatantId);
        if (!character) {
          return failure("UnknownCombatant", `${combatantId} is in the encounter but not on the roster`);
        }
        if (event.type === "healing" && isDead(character)) {
          return failure("InvalidState", `${character.name} is dead and cannot be healed`);
        }
        const next = applyVitalEvent(character, event);
        return this.commitCharacter(campaignId, operation, options, encounter, character, next);
      }

      // Encounter-only combatant
      const delta = event.type === "damage" ? -event.amount : event.amount;
      const updated = adjustSnapshotHp(snapshot, delta);
      const next = bumpVersion(replaceCombatant(encounter, combatantId, updated));
      const failed = await this.commit(campaignId, operation, options, { encounter: next });
      if (failed) return failed;

      if (updated.currentHp !== snapshot.currentHp) {
        this.router.notify(campaignId, "CHARACTER_STATE_UPDATED", {
          characterId: combatantId,
          key: "currentHp",
          value: updated.currentHp,
        });
      }
      if (updated.isDefeated !== snapshot.isDefeated) {
        this.router.notify(campaignId, "CHARACTER_STATE_UPDATED", {
          characterId: combatantId,
          key: "isDefeated",
          value: updated.isDefeated,
        });
      }
      return success({
        combatantId,
        currentHp: updated.currentHp,
        maxHp: updated.maxHp,
        isDefeated: updated.isDefeated,
        character: null,
      });
    });
  }

  /**
   * Persist a roster change and, when the character is fighting, its
   * snapshot. Unchanged characters write nothing and broadcast nothing.
   */
  private async commitCharacter(
    campaignId: string,
    operation: string,
    options: OperationOptions,
    encounter: Encounter | null,
    before: RosterCharacter,
    after: RosterCharacter
  ): Promise<CombatResult<VitalsUpdate>> {
    const snapshot = encounter?.combatants[after.id];
    const marked = snapshot?.markedDefeated === true;
    const result: VitalsUpdate = {
      combatantId: after.id,
      currentHp: after.currentHp,
      maxHp: after.maxHp,
      isDefeated: marked || isCharacterDefeated(after),
      character: after,
    };
    if (!this.characterChanged(before, after)) {
      return success(result);
    }

    const plan: WritePlan = { character: after };
    if (encounter && snapshot) {
      plan.encounter = bumpVersion(replaceCombatant(encounter, after.id, syncSnapshotWithRoster(snapshot, after)));
    }

    const failed = await this.commit(campaignId, operation, options, plan);
    if (failed) return failed;

    this.emitCharacterChanges(campaignId, before, after, marked);
    return success(result);
  }

  private characterChanged(before: RosterCharacter, after: RosterCharacter): boolean {
    return (
      before.currentHp !== after.currentHp ||
      before.tempHp !== after.tempHp ||
      before.deathSaveSuccesses !== after.deathSaveSuccesses ||
      before.deathSaveFailures !== after.deathSaveFailures ||
      !sameConditions(before.conditions, after.conditions)
    );
  }

  private emitCharacterChanges(
    campaignId: string,
    before: RosterCharacter,
    after: RosterCharacter,
    marked: boolean
  ): void {
    const characterId = after.id;

    if (before.currentHp !== after.currentHp) {
      this.router.notify(campaignId, "CHARACTER_STATE_UPDATED", { characterId, key: "currentHp", value: after.currentHp });
    }
    if (before.tempHp !== after.tempHp) {
      this.router.notify(campaignId, "CHARACTER_STATE_UPDATED", { characterId, key: "tempHp", value: after.tempHp });
    }
    if (!sameConditions(before.conditions, after.conditions)) {
      this.router.notify(campaignId, "CHARACTER_STATE_UPDATED", {
        characterId,
        key: "conditions",
        value: after.conditions,
      });
    }
    const defeatedBefore = marked || isCharacterDefeated(before);
    const defeatedAfter = marked || isCharacterDefeated(after);
    if (defeatedBefore !== defeatedAfter) {
      this.router.notify(campaignId, "CHARACTER_STATE_UPDATED", { characterId, key: "isDefeated", value: defeatedAfter });
    }

    if (
      isPlayerCharacter(after) &&
      (before.deathSaveSuccesses !== after.deathSaveSuccesses ||
        before.deathSaveFailures !== after.deathSaveFailures ||
        isStable(before) !== isStable(after) ||
        isDead(before) !== isDead(after))
    ) {
      this.router.notify(campaignId, "DEATH_SAVE_UPDATED", {
        characterId,
        successes: after.deathSaveSuccesses,
        failures: after.deathSaveFailures,
        isStable: isStable(after),
        isDead: isDead(after),
      });
    }
  }
}

