// discord.js implementation of the platform gateway.

import {
  ChannelType,
  Client,
  DiscordAPIError,
  Events,
  GatewayIntentBits,
  PermissionFlagsBits,
  RESTJSONErrorCodes,
  type Channel,
  type DMChannel,
  type NonThreadGuildBasedChannel,
  type VoiceChannel,
  type VoiceState
} from "discord.js";
import type { Logger } from "pino";

import { PlatformError, describeError } from "./errors.js";
import type {
  ChannelDeletedEvent,
  CreateChannelRequest,
  MemberMovedEvent,
  PermissionSubject,
  PlatformChannel,
  PlatformChannelKind,
  PlatformGateway
} from "./gateway.js";

const toPlatformError = (action: string, error: unknown): PlatformError => {
  if (error instanceof PlatformError) {
    return error;
  }

  if (error instanceof DiscordAPIError) {
    if (error.code === RESTJSONErrorCodes.UnknownChannel) {
      return new PlatformError("unknown-channel", `${action}: ${error.message}`, { cause: error });
    }
    if (
      error.code === RESTJSONErrorCodes.MissingPermissions ||
      error.code === RESTJSONErrorCodes.MissingAccess ||
      error.status === 403
    ) {
      return new PlatformError("forbidden", `${action}: ${error.message}`, { cause: error });
    }
  }

  return new PlatformError("platform-unavailable", `${action}: ${describeError(error)}`, { cause: error });
};

const kindOf = (channel: Channel): PlatformChannelKind => {
  switch (channel.type) {
    case ChannelType.GuildVoice:
      return "voice";
    case ChannelType.GuildCategory:
      return "category";
    default:
      return "other";
  }
};

export class DiscordGateway implements PlatformGateway {
  private readonly client: Client;
  private readonly logger: Logger;

  public constructor(logger: Logger, client?: Client) {
    this.logger = logger.child({ component: "discord-gateway" });
    this.client = client ?? new Client({
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildVoiceStates, GatewayIntentBits.GuildMembers]
    });
  }

  /** Log in and resolve once the gateway session is ready. */
  public async start(token: string): Promise<void> {
    const ready = new Promise<void>((resolve) => {
      this.client.once(Events.ClientReady, (client) => {
        this.logger.info({ event: "discord.ready", user: client.user.tag, guilds: client.guilds.cache.size });
        resolve();
      });
    });

    await this.client.login(token);
    await ready;
  }

  public async stop(): Promise<void> {
    await this.client.destroy();
  }

  public async createCategory(guildId: string, name: string): Promise<string> {
    return this.call("create category", async () => {
      const guild = await this.client.guilds.fetch(guildId);
      const category = await guild.channels.create({ name, type: ChannelType.GuildCategory });
      return category.id;
    });
  }

  public async createChannel(request: CreateChannelRequest): Promise<string> {
    return this.call("create channel", async () => {
      const guild = await this.client.guilds.fetch(request.guildId);
      const channel = await guild.channels.create({
        name: request.name,
        type: ChannelType.GuildVoice,
        parent: request.categoryId,
        userLimit: request.limit,
        permissionOverwrites: request.ownerId
          ? [
              {
                id: request.ownerId,
                allow: [PermissionFlagsBits.ManageChannels, PermissionFlagsBits.Connect, PermissionFlagsBits.Speak]
              }
            ]
          : []
      });
      return channel.id;
    });
  }

  public async deleteChannel(channelId: string): Promise<void> {
    await this.call("delete channel", async () => {
      const channel = await this.client.channels.fetch(channelId);
      if (!channel) {
        throw new PlatformError("unknown-channel", `delete channel: ${channelId} not found`);
      }
      await channel.delete();
    });
  }

  public async fetchChannel(channelId: string): Promise<PlatformChannel | null> {
    let channel: Channel | null;
    try {
      channel = await this.client.channels.fetch(channelId);
    } catch (error) {
      const failure = toPlatformError("fetch channel", error);
      if (failure.reason === "unknown-channel") {
        return null;
      }
      throw failure;
    }

    if (!channel || channel.isDMBased()) {
      return null;
    }

    return {
      id: channel.id,
      guildId: channel.guildId,
      parentId: channel.parentId,
      kind: kindOf(channel),
      name: channel.name
    };
  }

  public async moveMember(guildId: string, userId: string, channelId: string): Promise<void> {
    await this.call("move member", async () => {
      const guild = await this.client.guilds.fetch(guildId);
      const member = await guild.members.fetch(userId);
      await member.voice.setChannel(channelId);
    });
  }

  public async renameChannel(channelId: string, name: string): Promise<void> {
    await this.call("rename channel", async () => {
      const channel = await this.client.channels.fetch(channelId);
      if (!channel || channel.isDMBased()) {
        throw new PlatformError("unknown-channel", `rename channel: ${channelId} not found`);
      }
      await channel.setName(name);
    });
  }

  public async setLimit(channelId: string, limit: number): Promise<void> {
    await this.call("set user limit", async () => {
      const channel = await this.voiceChannel(channelId);
      await channel.setUserLimit(limit);
    });
  }

  public async setPermission(channelId: string, subject: PermissionSubject, allow: boolean): Promise<void> {
    await this.call("set permission", async () => {
      const channel = await this.voiceChannel(channelId);

      if (subject.kind === "everyone") {
        await channel.permissionOverwrites.edit(channel.guild.roles.everyone.id, { Connect: allow });
        return;
      }

      await channel.permissionOverwrites.edit(subject.userId, { Connect: allow, ViewChannel: allow });
    });
  }

  public async setManager(channelId: string, userId: string, granted: boolean): Promise<void> {
    await this.call("set manager", async () => {
      const channel = await this.voiceChannel(channelId);
      await channel.permissionOverwrites.edit(userId, {
        ManageChannels: granted ? true : null,
        Connect: granted ? true : null
      });
    });
  }

  public async currentMembers(channelId: string): Promise<ReadonlySet<string>> {
    return this.call("read members", async () => {
      const channel = await this.voiceChannel(channelId);
      return new Set(channel.members.keys());
    });
  }

  public onMemberMoved(listener: (event: MemberMovedEvent) => void): () => void {
    const handler = (oldState: VoiceState, newState: VoiceState): void => {
      const member = newState.member ?? oldState.member;
      if (!member) {
        return;
      }

      listener({
        guildId: newState.guild.id,
        userId: member.id,
        displayName: member.displayName,
        isBot: member.user.bot,
        fromChannelId: oldState.channelId,
        toChannelId: newState.channelId
      });
    };

    this.client.on(Events.VoiceStateUpdate, handler);
    return () => {
      this.client.off(Events.VoiceStateUpdate, handler);
    };
  }

  public onChannelDeleted(listener: (event: ChannelDeletedEvent) => void): () => void {
    const handler = (channel: DMChannel | NonThreadGuildBasedChannel): void => {
      if (channel.isDMBased()) {
        return;
      }

      listener({ guildId: channel.guildId, channelId: channel.id });
    };

    this.client.on(Events.ChannelDelete, handler);
    return () => {
      this.client.off(Events.ChannelDelete, handler);
    };
  }

  private async voiceChannel(channelId: string): Promise<VoiceChannel> {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || channel.type !== ChannelType.GuildVoice) {
      throw new PlatformError("unknown-channel", `${channelId} is not a voice channel`);
    }
    return channel;
  }

  private async call<T>(action: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      const failure = toPlatformError(action, error);
      this.logger.debug({ event: "discord.call-failed", action, reason: failure.reason, message: failure.message });
      throw failure;
    }
  }
}
