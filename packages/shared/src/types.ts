export interface GuildConfig {
  guildId: string;
  ownerId: string;
  categoryId: string | null;
  incubatorChannelId: string | null;
  cleanupOnStartup: boolean;
}

export interface ChannelDefaults {
  name: string | null;
  limit: number | null;
}

export interface TemporaryChannel {
  channelId: string;
  guildId: string;
  ownerId: string | null;
  locked: boolean;
  permittedUserIds: string[];
  createdAt: string;
}

export type AuditAction =
  | "setup"
  | "setup-repaired"
  | "incubator-renamed"
  | "category-renamed"
  | "incubator-changed"
  | "category-changed"
  | "cleanup-changed"
  | "defaults-set"
  | "channel-created"
  | "channel-creation-failed"
  | "moved-to-existing"
  | "member-left"
  | "channel-deleted"
  | "channel-delete-failed"
  | "channel-locked"
  | "channel-unlocked"
  | "channel-permitted"
  | "channel-claimed"
  | "channel-renamed"
  | "channel-limit-changed"
  | "default-name-set"
  | "default-limit-set"
  | "config-error"
  | "reconciled";

export type AuditOutcome = "success" | "failure";

export interface AuditEntry {
  id: number;
  timestamp: string;
  guildId: string;
  actorId: string | null;
  action: AuditAction;
  channelId: string | null;
  outcome: AuditOutcome;
  details: string | null;
}

export interface ChannelListing {
  channel: TemporaryChannel;
  // Read at call time; null when the platform could not answer.
  memberCount: number | null;
}
