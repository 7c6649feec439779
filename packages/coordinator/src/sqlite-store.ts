// SQLite-backed CoordinatorStore implementation.
// Data survives restarts. Uses better-sqlite3 (synchronous); commit runs in one transaction.

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type {
  AuditAction,
  AuditEntry,
  AuditOutcome,
  ChannelDefaults,
  GuildConfig,
  TemporaryChannel
} from "../../shared/src/types.js";
import type { ChannelPatch, CoordinatorStore, StoreWrite } from "./store.js";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS guild_configs (
  guild_id TEXT PRIMARY KEY,
  owner_id TEXT NOT NULL,
  category_id TEXT,
  incubator_channel_id TEXT,
  cleanup_on_startup INTEGER NOT NULL DEFAULT 1
);

CREATE TABLE IF NOT EXISTS guild_defaults (
  guild_id TEXT PRIMARY KEY,
  channel_name TEXT,
  channel_limit INTEGER
);

CREATE TABLE IF NOT EXISTS user_preferences (
  guild_id TEXT NOT NULL,
  user_id TEXT NOT NULL,
  channel_name TEXT,
  channel_limit INTEGER,
  PRIMARY KEY (guild_id, user_id)
);

CREATE TABLE IF NOT EXISTS temporary_channels (
  channel_id TEXT PRIMARY KEY,
  guild_id TEXT NOT NULL,
  owner_id TEXT,
  locked INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS temporary_channels_owner ON temporary_channels (guild_id, owner_id);

CREATE TABLE IF NOT EXISTS channel_permits (
  channel_id TEXT NOT NULL REFERENCES temporary_channels(channel_id) ON DELETE CASCADE,
  user_id TEXT NOT NULL,
  PRIMARY KEY (channel_id, user_id)
);

CREATE TABLE IF NOT EXISTS audit_entries (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp TEXT NOT NULL,
  guild_id TEXT NOT NULL,
  actor_id TEXT,
  action TEXT NOT NULL,
  channel_id TEXT,
  outcome TEXT NOT NULL,
  details TEXT
);

CREATE INDEX IF NOT EXISTS audit_entries_guild ON audit_entries (guild_id, id);
`;

const CHANNEL_COLUMNS = "channel_id, guild_id, owner_id, locked, created_at";

export class SqliteStore implements CoordinatorStore {
  private readonly db: Database.Database;
  private readonly applyAll: (writes: StoreWrite[]) => void;

  public constructor(dbPath: string) {
    mkdirSync(dirname(dbPath), { recursive: true });

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);

    this.applyAll = this.db.transaction((writes: StoreWrite[]) => {
      for (const write of writes) {
        this.applyWrite(write);
      }
    });
  }

  public async getGuildConfig(guildId: string): Promise<GuildConfig | null> {
    const row = this.db
      .prepare(
        "SELECT guild_id, owner_id, category_id, incubator_channel_id, cleanup_on_startup FROM guild_configs WHERE guild_id = ?"
      )
      .get(guildId) as RawGuildConfigRow | undefined;

    return row ? toGuildConfig(row) : null;
  }

  public async getGuildDefaults(guildId: string): Promise<ChannelDefaults | null> {
    const row = this.db
      .prepare("SELECT channel_name, channel_limit FROM guild_defaults WHERE guild_id = ?")
      .get(guildId) as RawDefaultsRow | undefined;

    return row ? toDefaults(row) : null;
  }

  public async getUserPreference(guildId: string, userId: string): Promise<ChannelDefaults | null> {
    const row = this.db
      .prepare("SELECT channel_name, channel_limit FROM user_preferences WHERE guild_id = ? AND user_id = ?")
      .get(guildId, userId) as RawDefaultsRow | undefined;

    return row ? toDefaults(row) : null;
  }

  public async getChannel(channelId: string): Promise<TemporaryChannel | null> {
    const row = this.db
      .prepare(`SELECT ${CHANNEL_COLUMNS} FROM temporary_channels WHERE channel_id = ?`)
      .get(channelId) as RawChannelRow | undefined;

    return row ? this.toChannel(row) : null;
  }

  public async findChannelsByOwner(guildId: string, ownerId: string): Promise<TemporaryChannel[]> {
    const rows = this.db
      .prepare(
        `SELECT ${CHANNEL_COLUMNS} FROM temporary_channels WHERE guild_id = ? AND owner_id = ? ORDER BY created_at`
      )
      .all(guildId, ownerId) as RawChannelRow[];

    return rows.map((row) => this.toChannel(row));
  }

  public async listChannels(guildId?: string): Promise<TemporaryChannel[]> {
    const rows = (
      guildId === undefined
        ? this.db.prepare(`SELECT ${CHANNEL_COLUMNS} FROM temporary_channels ORDER BY created_at`).all()
        : this.db
            .prepare(`SELECT ${CHANNEL_COLUMNS} FROM temporary_channels WHERE guild_id = ? ORDER BY created_at`)
            .all(guildId)
    ) as RawChannelRow[];

    return rows.map((row) => this.toChannel(row));
  }

  public async latestAuditEntries(guildId: string, count: number): Promise<AuditEntry[]> {
    const rows = this.db
      .prepare(
        `SELECT id, timestamp, guild_id, actor_id, action, channel_id, outcome, details
         FROM audit_entries WHERE guild_id = ? ORDER BY id DESC LIMIT ?`
      )
      .all(guildId, count) as RawAuditRow[];

    return rows.map(toAuditEntry);
  }

  public async commit(writes: StoreWrite[]): Promise<void> {
    this.applyAll(writes);
  }

  public close(): void {
    this.db.close();
  }

  private applyWrite(write: StoreWrite): void {
    switch (write.type) {
      case "save-guild-config":
        this.db
          .prepare(
            `INSERT INTO guild_configs (guild_id, owner_id, category_id, incubator_channel_id, cleanup_on_startup)
             VALUES (@guildId, @ownerId, @categoryId, @incubatorChannelId, @cleanupOnStartup)
             ON CONFLICT (guild_id) DO UPDATE SET
               owner_id = excluded.owner_id,
               category_id = excluded.category_id,
               incubator_channel_id = excluded.incubator_channel_id,
               cleanup_on_startup = excluded.cleanup_on_startup`
          )
          .run({ ...write.config, cleanupOnStartup: write.config.cleanupOnStartup ? 1 : 0 });
        return;
      case "save-guild-defaults":
        this.saveDefaults("guild_defaults", { guild_id: write.guildId }, write.patch);
        return;
      case "save-user-preference":
        this.saveDefaults("user_preferences", { guild_id: write.guildId, user_id: write.userId }, write.patch);
        return;
      case "insert-channel":
        this.db
          .prepare(
            `INSERT INTO temporary_channels (channel_id, guild_id, owner_id, locked, created_at)
             VALUES (?, ?, ?, ?, ?)`
          )
          .run(
            write.channel.channelId,
            write.channel.guildId,
            write.channel.ownerId,
            write.channel.locked ? 1 : 0,
            write.channel.createdAt
          );
        this.replacePermits(write.channel.channelId, write.channel.permittedUserIds);
        return;
      case "update-channel":
        this.updateChannel(write.channelId, write.patch);
        return;
      case "delete-channel":
        this.db.prepare("DELETE FROM temporary_channels WHERE channel_id = ?").run(write.channelId);
        return;
      case "append-audit":
        this.db
          .prepare(
            `INSERT INTO audit_entries (timestamp, guild_id, actor_id, action, channel_id, outcome, details)
             VALUES (@timestamp, @guildId, @actorId, @action, @channelId, @outcome, @details)`
          )
          .run(write.entry);
        return;
    }
  }

  private saveDefaults(
    table: "guild_defaults" | "user_preferences",
    key: Record<string, string>,
    patch: Partial<ChannelDefaults>
  ): void {
    const keyColumns = Object.keys(key);
    const where = keyColumns.map((column) => `${column} = @${column}`).join(" AND ");

    this.db
      .prepare(`INSERT OR IGNORE INTO ${table} (${keyColumns.join(", ")}) VALUES (${keyColumns.map((c) => `@${c}`).join(", ")})`)
      .run(key);

    if (patch.name !== undefined) {
      this.db.prepare(`UPDATE ${table} SET channel_name = @name WHERE ${where}`).run({ ...key, name: patch.name });
    }
    if (patch.limit !== undefined) {
      this.db.prepare(`UPDATE ${table} SET channel_limit = @limit WHERE ${where}`).run({ ...key, limit: patch.limit });
    }
  }

  private updateChannel(channelId: string, patch: ChannelPatch): void {
    if (patch.ownerId !== undefined) {
      this.db.prepare("UPDATE temporary_channels SET owner_id = ? WHERE channel_id = ?").run(patch.ownerId, channelId);
    }
    if (patch.locked !== undefined) {
      this.db
        .prepare("UPDATE temporary_channels SET locked = ? WHERE channel_id = ?")
        .run(patch.locked ? 1 : 0, channelId);
    }
    if (patch.permittedUserIds !== undefined) {
      const exists = this.db.prepare("SELECT 1 FROM temporary_channels WHERE channel_id = ?").get(channelId);
      if (exists) {
        this.replacePermits(channelId, patch.permittedUserIds);
      }
    }
  }

  private replacePermits(channelId: string, userIds: string[]): void {
    this.db.prepare("DELETE FROM channel_permits WHERE channel_id = ?").run(channelId);

    const insert = this.db.prepare("INSERT OR IGNORE INTO channel_permits (channel_id, user_id) VALUES (?, ?)");
    for (const userId of userIds) {
      insert.run(channelId, userId);
    }
  }

  private toChannel(row: RawChannelRow): TemporaryChannel {
    const permits = this.db
      .prepare("SELECT user_id FROM channel_permits WHERE channel_id = ? ORDER BY rowid")
      .all(row.channel_id) as Array<{ user_id: string }>;

    return {
      channelId: row.channel_id,
      guildId: row.guild_id,
      ownerId: row.owner_id,
      locked: row.locked === 1,
      permittedUserIds: permits.map((permit) => permit.user_id),
      createdAt: row.created_at
    };
  }
}

// Raw row shapes returned by better-sqlite3 (snake_case column names).

interface RawGuildConfigRow {
  guild_id: string;
  owner_id: string;
  category_id: string | null;
  incubator_channel_id: string | null;
  cleanup_on_startup: number;
}

interface RawDefaultsRow {
  channel_name: string | null;
  channel_limit: number | null;
}

interface RawChannelRow {
  channel_id: string;
  guild_id: string;
  owner_id: string | null;
  locked: number;
  created_at: string;
}

interface RawAuditRow {
  id: number;
  timestamp: string;
  guild_id: string;
  actor_id: string | null;
  action: AuditAction;
  channel_id: string | null;
  outcome: AuditOutcome;
  details: string | null;
}

const toGuildConfig = (row: RawGuildConfigRow): GuildConfig => ({
  guildId: row.guild_id,
  ownerId: row.owner_id,
  categoryId: row.category_id,
  incubatorChannelId: row.incubator_channel_id,
  cleanupOnStartup: row.cleanup_on_startup === 1
});

const toDefaults = (row: RawDefaultsRow): ChannelDefaults => ({
  name: row.channel_name,
  limit: row.channel_limit
});

const toAuditEntry = (row: RawAuditRow): AuditEntry => ({
  id: row.id,
  timestamp: row.timestamp,
  guildId: row.guild_id,
  actorId: row.actor_id,
  action: row.action,
  channelId: row.channel_id,
  outcome: row.outcome,
  details: row.details
});
