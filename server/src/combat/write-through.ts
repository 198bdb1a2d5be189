/**
 * Dual-representation writes.
 *
 * A player character lives twice while an encounter is active: on the roster
 * (authoritative) and as a combatant snapshot. Writes always go roster first,
 * encounter second. Nothing is retried here; the caller decides.
 */

import type { CombatFailure, Encounter, RosterCharacter } from "@shared/combat";
import { failure } from "@shared/combat";
import type { Logger } from "../logger";
import type { EncounterStore, RosterStore } from "../store/types";

export interface WritePlan {
  character?: RosterCharacter;
  encounter?: Encounter;
  clearEncounter?: boolean;
}

export interface CampaignStores {
  roster: RosterStore;
  encounters: EncounterStore;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function partialUpdate(message: string): CombatFailure {
  return { ...failure("PartialUpdate", message), committed: "roster" };
}

/**
 * Returns null when every write landed.
 */
export async function writeThrough(
  stores: CampaignStores,
  campaignId: string,
  plan: WritePlan,
  logger: Logger
): Promise<CombatFailure | null> {
  let rosterCommitted = false;

  try {
    if (plan.character) {
      await stores.roster.saveCharacter(campaignId, plan.character);
      rosterCommitted = true;
    }
    if (plan.encounter) {
      await stores.encounters.saveEncounter(campaignId, plan.encounter);
    } else if (plan.clearEncounter) {
      await stores.encounters.clearEncounter(campaignId);
    }
    return null;
  } catch (error) {
    if (rosterCommitted && plan.character) {
      logger.error("Encounter write failed after the roster write landed", {
        campaignId,
        characterId: plan.character.id,
        error: describe(error),
      });
      return partialUpdate(
        `Roster entry ${plan.character.id} was saved but the encounter snapshot was not: ${describe(error)}`
      );
    }
    logger.error("Campaign write failed", { campaignId, error: describe(error) });
    return failure("StorageUnavailable", `Nothing was saved: ${describe(error)}`);
  }
}
