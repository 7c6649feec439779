// Persistence contracts for the coordinator.
// Implementations: MemoryStore (tests, ephemeral runs), SqliteStore.

import type {
  AuditAction,
  AuditEntry,
  AuditOutcome,
  ChannelDefaults,
  GuildConfig,
  TemporaryChannel
} from "../../shared/src/types.js";

export interface SettingsStore {
  getGuildConfig(guildId: string): Promise<GuildConfig | null>;
  getGuildDefaults(guildId: string): Promise<ChannelDefaults | null>;
  getUserPreference(guildId: string, userId: string): Promise<ChannelDefaults | null>;
}

export interface ChannelRegistry {
  getChannel(channelId: string): Promise<TemporaryChannel | null>;
  findChannelsByOwner(guildId: string, ownerId: string): Promise<TemporaryChannel[]>;
  listChannels(guildId?: string): Promise<TemporaryChannel[]>;
}

export interface AuditLog {
  // Newest first.
  latestAuditEntries(guildId: string, count: number): Promise<AuditEntry[]>;
}

export type NewAuditEntry = {
  guildId: string;
  actorId: string | null;
  action: AuditAction;
  channelId: string | null;
  outcome: AuditOutcome;
  details: string | null;
  timestamp: string;
};

export type ChannelPatch = Partial<Pick<TemporaryChannel, "ownerId" | "locked" | "permittedUserIds">>;

export type StoreWrite =
  | { type: "save-guild-config"; config: GuildConfig }
  | { type: "save-guild-defaults"; guildId: string; patch: Partial<ChannelDefaults> }
  | { type: "save-user-preference"; guildId: string; userId: string; patch: Partial<ChannelDefaults> }
  | { type: "insert-channel"; channel: TemporaryChannel }
  | { type: "update-channel"; channelId: string; patch: ChannelPatch }
  | { type: "delete-channel"; channelId: string }
  | { type: "append-audit"; entry: NewAuditEntry };

export interface CoordinatorStore extends SettingsStore, ChannelRegistry, AuditLog {
  /**
   * Apply every write as one atomic unit: either all of them land or none do.
   * Inserting a channel that is already registered fails the whole unit.
   */
  commit(writes: StoreWrite[]): Promise<void>;
  close(): void;
}
