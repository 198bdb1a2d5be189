/**
 * Combat - WebSocket Event Types
 *
 * Message protocol between clients and the campaign hub, and the fixed
 * audience every routed event is delivered to.
 */

import type { CampaignSnapshot, CombatantView, EncounterView } from "./state";
import type { CombatErrorCode } from "./errors";

// ═══════════════════════════════════════════════════════════════════════════
// CLIENT -> SERVER MESSAGE TYPES
// ═══════════════════════════════════════════════════════════════════════════

export const CLIENT_MESSAGE_TYPES = [
  "REQUEST_STATE",
  // Combat lifecycle
  "START_COMBAT",
  "END_COMBAT",
  "ADD_COMBATANT",
  "MARK_DEFEATED",
  // Turns & initiative
  "ADVANCE_TURN",
  "SET_INITIATIVE",
  // Vitals
  "APPLY_DAMAGE",
  "APPLY_HEALING",
  "RECORD_DEATH_SAVE",
  "SET_CONDITION",
  // Narration
  "SUBMIT_CHOICE",
] as const;

export type ClientMessageType = (typeof CLIENT_MESSAGE_TYPES)[number];

export interface ClientMessage {
  type: ClientMessageType;
  payload: Record<string, unknown>;
  requestId?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// AUDIENCES
// ═══════════════════════════════════════════════════════════════════════════

export type Audience = "dm" | "players" | "all";

// ═══════════════════════════════════════════════════════════════════════════
// SERVER -> CLIENT PAYLOADS
// ═══════════════════════════════════════════════════════════════════════════

/** Canonical keys for CHARACTER_STATE_UPDATED; they match the stored field names. */
export type CharacterStateKey = "currentHp" | "tempHp" | "conditions" | "isDefeated";

export interface CharacterStateUpdatedPayload {
  characterId: string;
  key: CharacterStateKey;
  value: number | boolean | string[];
}

export interface TurnAdvancedPayload {
  newTurnIndex: number;
  currentCombatantId: string;
  roundNumber: number;
}

export interface DeathSaveUpdatedPayload {
  characterId: string;
  successes: number;
  failures: number;
  isStable: boolean;
  isDead: boolean;
}

export interface InitiativeSetPayload {
  combatantId: string;
  initiative: number;
  turnOrder: string[];
  currentTurnIndex: number;
}

export interface CombatantAddedPayload {
  combatant: CombatantView;
  turnOrder: string[];
  currentTurnIndex: number;
}

export interface PresencePayload {
  userId: string;
  characterId: string;
  isOnline: boolean;
}

export interface PlayerChoiceSubmittedPayload {
  characterId: string | null;
  userId: string;
  choice: string;
  submittedAt: string;
}

export interface AtmospherePulsePayload {
  text: string;
  intensity: "low" | "medium" | "high";
  sensoryType: string | null;
}

export const ROLL_OUTCOMES = ["Success", "Failure", "Critical Success", "Critical Failure"] as const;

export type RollOutcome = (typeof ROLL_OUTCOMES)[number];

export interface PlayerRollLoggedPayload {
  id: string;
  characterId: string;
  /** Roster name; null when the roller is not on the roster */
  characterName: string | null;
  checkType: string;
  result: number;
  outcome: RollOutcome;
  rolledAt: string;
}

export interface SceneImageUpdatedPayload {
  imageUri: string;
  description: string;
}

export const NARRATIVE_MOODS = ["danger", "mystery", "safety", "urgency"] as const;

export type NarrativeMood = (typeof NARRATIVE_MOODS)[number];

/** Persistent banner on player screens; replaced by the next anchor. */
export interface NarrativeAnchorPayload {
  shortText: string;
  moodCategory: NarrativeMood | null;
}

export interface GroupInsightPayload {
  text: string;
  relevantSkill: string;
  highlightEffect: boolean;
}

/** Routed events and the payload each carries. */
export interface RoutedEventPayloads {
  COMBAT_STARTED: EncounterView;
  TURN_ADVANCED: TurnAdvancedPayload;
  CHARACTER_STATE_UPDATED: CharacterStateUpdatedPayload;
  DEATH_SAVE_UPDATED: DeathSaveUpdatedPayload;
  INITIATIVE_SET: InitiativeSetPayload;
  COMBATANT_ADDED: CombatantAddedPayload;
  COMBAT_ENDED: Record<string, never>;
  PLAYER_CONNECTED: PresencePayload;
  PLAYER_DISCONNECTED: PresencePayload;
  READ_ALOUD_TEXT: { text: string };
  PLAYER_CHOICE_SUBMITTED: PlayerChoiceSubmittedPayload;
  PLAYER_CHOICES_PRESENTED: { choices: string[] };
  ATMOSPHERE_PULSE: AtmospherePulsePayload;
  PLAYER_ROLL_LOGGED: PlayerRollLoggedPayload;
  SCENE_IMAGE_UPDATED: SceneImageUpdatedPayload;
  NARRATIVE_ANCHOR_UPDATED: NarrativeAnchorPayload;
  GROUP_INSIGHT_TRIGGERED: GroupInsightPayload;
}

export type RoutedEventType = keyof RoutedEventPayloads;

/** Each event type goes to exactly one audience, never chosen per call. */
export const EVENT_AUDIENCE = {
  COMBAT_STARTED: "all",
  TURN_ADVANCED: "all",
  CHARACTER_STATE_UPDATED: "all",
  DEATH_SAVE_UPDATED: "all",
  INITIATIVE_SET: "all",
  COMBATANT_ADDED: "all",
  COMBAT_ENDED: "all",
  PLAYER_CONNECTED: "dm",
  PLAYER_DISCONNECTED: "dm",
  READ_ALOUD_TEXT: "dm",
  PLAYER_CHOICE_SUBMITTED: "dm",
  PLAYER_CHOICES_PRESENTED: "players",
  ATMOSPHERE_PULSE: "players",
  PLAYER_ROLL_LOGGED: "all",
  SCENE_IMAGE_UPDATED: "all",
  NARRATIVE_ANCHOR_UPDATED: "players",
  GROUP_INSIGHT_TRIGGERED: "players",
} as const satisfies Record<RoutedEventType, Audience>;

/** Replies sent to a single socket, outside any audience group. */
export interface DirectEventPayloads {
  STATE_SYNC: CampaignSnapshot;
  ACTION_REJECTED: { reason: string; code: CombatErrorCode | "PermissionDenied" };
  ERROR: { message: string };
}

export type ServerEventPayloads = RoutedEventPayloads & DirectEventPayloads;

export type ServerEventType = keyof ServerEventPayloads;

// ═══════════════════════════════════════════════════════════════════════════
// ENVELOPE
// ═══════════════════════════════════════════════════════════════════════════

export interface ServerEvent<T extends ServerEventType = ServerEventType> {
  type: T;
  campaignId: string;
  payload: ServerEventPayloads[T];
  timestamp: string;
  requestId?: string;
}

export function createServerEvent<T extends ServerEventType>(
  type: T,
  campaignId: string,
  payload: ServerEventPayloads[T],
  requestId?: string
): ServerEvent<T> {
  const event: ServerEvent<T> = {
    type,
    campaignId,
    payload,
    timestamp: new Date().toISOString(),
  };
  if (requestId) event.requestId = requestId;
  return event;
}
