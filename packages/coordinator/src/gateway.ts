// Contract between the coordinator and the chat platform.
// Every call may reject with a PlatformError.

export type PlatformChannelKind = "voice" | "category" | "other";

export interface PlatformChannel {
  id: string;
  guildId: string;
  parentId: string | null;
  kind: PlatformChannelKind;
  name: string;
}

export type PermissionSubject =
  | {
      kind: "everyone";
    }
  | {
      kind: "member";
      userId: string;
    };

export interface CreateChannelRequest {
  guildId: string;
  categoryId: string;
  name: string;
  limit: number;
  // Receives channel management rights when set.
  ownerId: string | null;
}

export interface MemberMovedEvent {
  guildId: string;
  userId: string;
  displayName: string;
  isBot: boolean;
  fromChannelId: string | null;
  toChannelId: string | null;
}

export interface ChannelDeletedEvent {
  guildId: string;
  channelId: string;
}

export interface PlatformGateway {
  createCategory(guildId: string, name: string): Promise<string>;
  createChannel(request: CreateChannelRequest): Promise<string>;
  deleteChannel(channelId: string): Promise<void>;
  fetchChannel(channelId: string): Promise<PlatformChannel | null>;
  moveMember(guildId: string, userId: string, channelId: string): Promise<void>;
  renameChannel(channelId: string, name: string): Promise<void>;
  setLimit(channelId: string, limit: number): Promise<void>;
  // Connect (and view, for members) on a voice channel.
  setPermission(channelId: string, subject: PermissionSubject, allow: boolean): Promise<void>;
  setManager(channelId: string, userId: string, granted: boolean): Promise<void>;
  currentMembers(channelId: string): Promise<ReadonlySet<string>>;
  onMemberMoved(listener: (event: MemberMovedEvent) => void): () => void;
  onChannelDeleted(listener: (event: ChannelDeletedEvent) => void): () => void;
}
