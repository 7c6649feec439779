// In-memory CoordinatorStore implementation. Data is lost on restart.

import type {
  AuditEntry,
  ChannelDefaults,
  GuildConfig,
  TemporaryChannel
} from "../../shared/src/types.js";
import type { CoordinatorStore, StoreWrite } from "./store.js";

type MemoryState = {
  configs: Map<string, GuildConfig>;
  guildDefaults: Map<string, ChannelDefaults>;
  preferences: Map<string, ChannelDefaults>;
  channels: Map<string, TemporaryChannel>;
  audit: AuditEntry[];
};

const preferenceKey = (guildId: string, userId: string): string => `${guildId}:${userId}`;

const copyChannel = (channel: TemporaryChannel): TemporaryChannel => ({
  ...channel,
  permittedUserIds: [...channel.permittedUserIds]
});

const mergeDefaults = (existing: ChannelDefaults | undefined, patch: Partial<ChannelDefaults>): ChannelDefaults => ({
  name: patch.name !== undefined ? patch.name : existing?.name ?? null,
  limit: patch.limit !== undefined ? patch.limit : existing?.limit ?? null
});

export class MemoryStore implements CoordinatorStore {
  private state: MemoryState = {
    configs: new Map(),
    guildDefaults: new Map(),
    preferences: new Map(),
    channels: new Map(),
    audit: []
  };

  public async getGuildConfig(guildId: string): Promise<GuildConfig | null> {
    const config = this.state.configs.get(guildId);
    return config ? { ...config } : null;
  }

  public async getGuildDefaults(guildId: string): Promise<ChannelDefaults | null> {
    const defaults = this.state.guildDefaults.get(guildId);
    return defaults ? { ...defaults } : null;
  }

  public async getUserPreference(guildId: string, userId: string): Promise<ChannelDefaults | null> {
    const preference = this.state.preferences.get(preferenceKey(guildId, userId));
    return preference ? { ...preference } : null;
  }

  public async getChannel(channelId: string): Promise<TemporaryChannel | null> {
    const channel = this.state.channels.get(channelId);
    return channel ? copyChannel(channel) : null;
  }

  public async findChannelsByOwner(guildId: string, ownerId: string): Promise<TemporaryChannel[]> {
    return Array.from(this.state.channels.values())
      .filter((channel) => channel.guildId === guildId && channel.ownerId === ownerId)
      .map(copyChannel);
  }

  public async listChannels(guildId?: string): Promise<TemporaryChannel[]> {
    return Array.from(this.state.channels.values())
      .filter((channel) => guildId === undefined || channel.guildId === guildId)
      .map(copyChannel);
  }

  public async latestAuditEntries(guildId: string, count: number): Promise<AuditEntry[]> {
    return this.state.audit
      .filter((entry) => entry.guildId === guildId)
      .reverse()
      .slice(0, count)
      .map((entry) => ({ ...entry }));
  }

  public async commit(writes: StoreWrite[]): Promise<void> {
    // Work on a copy and swap it in only once every write has applied.
    const next: MemoryState = {
      configs: new Map(this.state.configs),
      guildDefaults: new Map(this.state.guildDefaults),
      preferences: new Map(this.state.preferences),
      channels: new Map(this.state.channels),
      audit: [...this.state.audit]
    };

    for (const write of writes) {
      applyWrite(next, write);
    }

    this.state = next;
  }

  public close(): void {
    // Nothing to release.
  }
}

const applyWrite = (state: MemoryState, write: StoreWrite): void => {
  switch (write.type) {
    case "save-guild-config":
      state.configs.set(write.config.guildId, { ...write.config });
      return;
    case "save-guild-defaults":
      state.guildDefaults.set(write.guildId, mergeDefaults(state.guildDefaults.get(write.guildId), write.patch));
      return;
    case "save-user-preference": {
      const key = preferenceKey(write.guildId, write.userId);
      state.preferences.set(key, mergeDefaults(state.preferences.get(key), write.patch));
      return;
    }
    case "insert-channel":
      if (state.channels.has(write.channel.channelId)) {
        throw new Error(`Channel ${write.channel.channelId} is already registered`);
      }
      state.channels.set(write.channel.channelId, copyChannel(write.channel));
      return;
    case "update-channel": {
      const existing = state.channels.get(write.channelId);
      if (!existing) {
        return;
      }
      state.channels.set(write.channelId, copyChannel({ ...existing, ...write.patch }));
      return;
    }
    case "delete-channel":
      state.channels.delete(write.channelId);
      return;
    case "append-audit": {
      const last = state.audit[state.audit.length - 1];
      state.audit.push({ ...write.entry, id: last ? last.id + 1 : 1 });
      return;
    }
  }
};
