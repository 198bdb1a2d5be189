/**
 * Connection Registry
 *
 * Who is connected to which campaign, and which audience groups each
 * connection belongs to. Purely in-memory; a reconnect is a new record.
 */

import type { Audience } from "@shared/combat";

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface ConnectionRecord {
  connectionId: string;
  campaignId: string;
  userId: string;
  characterId: string | null;
  isDm: boolean;
  connectedAt: string;
}

export function groupName(campaignId: string, audience: Audience): string {
  return `campaign:${campaignId}:${audience}`;
}

/** Groups a connection joins: its role group plus the campaign-wide one. */
export function groupsForRecord(record: ConnectionRecord): string[] {
  return [
    groupName(record.campaignId, record.isDm ? "dm" : "players"),
    groupName(record.campaignId, "all"),
  ];
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════

export class ConnectionRegistry {
  private connections = new Map<string, ConnectionRecord>();
  private groups = new Map<string, Set<string>>();

  join(record: ConnectionRecord): ConnectionRecord {
    if (this.connections.has(record.connectionId)) {
      this.leave(record.connectionId);
    }
    this.connections.set(record.connectionId, record);
    for (const group of groupsForRecord(record)) {
      let members = this.groups.get(group);
      if (!members) {
        members = new Set();
        this.groups.set(group, members);
      }
      members.add(record.connectionId);
    }
    return record;
  }

  /**
   * Remove a connection from every group. Returns the removed record, or null
   * if the connection was never registered (or already left).
   */
  leave(connectionId: string): ConnectionRecord | null {
    const record = this.connections.get(connectionId);
    if (!record) return null;
    this.connections.delete(connectionId);
    for (const group of groupsForRecord(record)) {
      const members = this.groups.get(group);
      if (!members) continue;
      members.delete(connectionId);
      if (members.size === 0) this.groups.delete(group);
    }
    return record;
  }

  get(connectionId: string): ConnectionRecord | null {
    return this.connections.get(connectionId) ?? null;
  }

  membersOf(group: string): string[] {
    return [...(this.groups.get(group) ?? [])];
  }

  connectionsInCampaign(campaignId: string): ConnectionRecord[] {
    return [...this.connections.values()].filter((record) => record.campaignId === campaignId);
  }

  /** Non-DM connections that control a character. */
  connectedPlayers(campaignId: string): ConnectionRecord[] {
    return this.connectionsInCampaign(campaignId).filter((record) => !record.isDm && record.characterId !== null);
  }

  isUserOnline(campaignId: string, userId: string): boolean {
    return this.connectionsInCampaign(campaignId).some((record) => record.userId === userId);
  }

  size(): number {
    return this.connections.size;
  }
}
