// Test helper: an in-process platform gateway and a coordinator wired to a MemoryStore.

import pino from "pino";

import { LifecycleCoordinator, type MembershipOutcome } from "../../src/coordinator.js";
import { PlatformError, type PlatformFailure } from "../../src/errors.js";
import type {
  ChannelDeletedEvent,
  CreateChannelRequest,
  MemberMovedEvent,
  PermissionSubject,
  PlatformChannel,
  PlatformChannelKind,
  PlatformGateway
} from "../../src/gateway.js";
import { MemoryStore } from "../../src/memory-store.js";
import type { CoordinatorStore, StoreWrite } from "../../src/store.js";

export const GUILD_ID = "g1";
export const ADMIN_ID = "admin";

type GatewayMethod =
  | "createCategory"
  | "createChannel"
  | "deleteChannel"
  | "fetchChannel"
  | "moveMember"
  | "renameChannel"
  | "setLimit"
  | "setPermission"
  | "setManager"
  | "currentMembers";

export interface FakeChannel extends PlatformChannel {
  limit: number;
  members: Set<string>;
  // Keyed by "everyone" or a user id.
  connect: Map<string, boolean>;
  managers: Set<string>;
}

/**
 * Platform stand-in. Calls are logged as "method:target", failures can be
 * queued per method, and a method can be held at a gate to force overlap.
 */
export class FakeGateway implements PlatformGateway {
  public readonly channels = new Map<string, FakeChannel>();
  public readonly calls: string[] = [];
  private nextId = 1;
  private readonly failures = new Map<GatewayMethod, Array<PlatformFailure | null>>();
  private readonly gates = new Map<GatewayMethod, Promise<void>>();
  private readonly movedListeners = new Set<(event: MemberMovedEvent) => void>();
  private readonly deletedListeners = new Set<(event: ChannelDeletedEvent) => void>();

  public addChannel(kind: PlatformChannelKind, name: string, parentId: string | null = null, guildId = GUILD_ID): string {
    const id = `p${this.nextId++}`;
    this.channels.set(id, {
      id,
      guildId,
      parentId,
      kind,
      name,
      limit: 0,
      members: new Set(),
      connect: new Map(),
      managers: new Set()
    });
    return id;
  }

  public channel(channelId: string): FakeChannel {
    const channel = this.channels.get(channelId);
    if (!channel) {
      throw new Error(`No fake channel ${channelId}`);
    }
    return channel;
  }

  /** Put a member into a channel without telling the coordinator. */
  public place(userId: string, channelId: string | null): string | null {
    let previous: string | null = null;
    for (const channel of this.channels.values()) {
      if (channel.members.delete(userId)) {
        previous = channel.id;
      }
    }
    if (channelId !== null) {
      this.channel(channelId).members.add(userId);
    }
    return previous;
  }

  public whereIs(userId: string): string | null {
    for (const channel of this.channels.values()) {
      if (channel.members.has(userId)) {
        return channel.id;
      }
    }
    return null;
  }

  /** Delete a channel out of band, the way an admin would. */
  public removeChannel(channelId: string): void {
    this.channels.delete(channelId);
  }

  /** Fail a coming call to `method`; `skip` lets that many calls through first. */
  public failNext(method: GatewayMethod, reason: PlatformFailure = "platform-unavailable", skip = 0): void {
    const queue = this.failures.get(method) ?? [];
    for (let index = 0; index < skip; index += 1) {
      queue.push(null);
    }
    queue.push(reason);
    this.failures.set(method, queue);
  }

  /** Hold every call to `method` until the returned function is called. */
  public hold(method: GatewayMethod): () => void {
    let release = (): void => undefined;
    this.gates.set(
      method,
      new Promise<void>((resolve) => {
        release = () => {
          this.gates.delete(method);
          resolve();
        };
      })
    );
    return release;
  }

  public callsTo(method: GatewayMethod): string[] {
    return this.calls.filter((call) => call.startsWith(`${method}:`));
  }

  public emitDeleted(event: ChannelDeletedEvent): void {
    for (const listener of this.deletedListeners) {
      listener(event);
    }
  }

  public emitMoved(event: MemberMovedEvent): void {
    for (const listener of this.movedListeners) {
      listener(event);
    }
  }

  public async createCategory(guildId: string, name: string): Promise<string> {
    await this.enter("createCategory", name);
    return this.addChannel("category", name, null, guildId);
  }

  public async createChannel(request: CreateChannelRequest): Promise<string> {
    await this.enter("createChannel", request.name);
    const category = this.channels.get(request.categoryId);
    if (!category || category.kind !== "category") {
      throw new PlatformError("unknown-channel", `Unknown category ${request.categoryId}`);
    }

    const id = this.addChannel("voice", request.name, request.categoryId, request.guildId);
    const channel = this.channel(id);
    channel.limit = request.limit;
    if (request.ownerId) {
      channel.managers.add(request.ownerId);
      channel.connect.set(request.ownerId, true);
    }
    return id;
  }

  public async deleteChannel(channelId: string): Promise<void> {
    await this.enter("deleteChannel", channelId);
    this.existing(channelId);
    this.channels.delete(channelId);
  }

  public async fetchChannel(channelId: string): Promise<PlatformChannel | null> {
    await this.enter("fetchChannel", channelId);
    const channel = this.channels.get(channelId);
    if (!channel) {
      return null;
    }
    return { id: channel.id, guildId: channel.guildId, parentId: channel.parentId, kind: channel.kind, name: channel.name };
  }

  public async moveMember(_guildId: string, userId: string, channelId: string): Promise<void> {
    await this.enter("moveMember", `${userId}->${channelId}`);
    this.existing(channelId);
    this.place(userId, channelId);
  }

  public async renameChannel(channelId: string, name: string): Promise<void> {
    await this.enter("renameChannel", channelId);
    this.existing(channelId).name = name;
  }

  public async setLimit(channelId: string, limit: number): Promise<void> {
    await this.enter("setLimit", channelId);
    this.existing(channelId).limit = limit;
  }

  public async setPermission(channelId: string, subject: PermissionSubject, allow: boolean): Promise<void> {
    const target = subject.kind === "everyone" ? "everyone" : subject.userId;
    await this.enter("setPermission", `${channelId}/${target}=${allow}`);
    this.existing(channelId).connect.set(target, allow);
  }

  public async setManager(channelId: string, userId: string, granted: boolean): Promise<void> {
    await this.enter("setManager", `${channelId}/${userId}=${granted}`);
    const channel = this.existing(channelId);
    if (granted) {
      channel.managers.add(userId);
    } else {
      channel.managers.delete(userId);
    }
  }

  public async currentMembers(channelId: string): Promise<ReadonlySet<string>> {
    await this.enter("currentMembers", channelId);
    return new Set(this.existing(channelId).members);
  }

  public onMemberMoved(listener: (event: MemberMovedEvent) => void): () => void {
    this.movedListeners.add(listener);
    return () => {
      this.movedListeners.delete(listener);
    };
  }

  public onChannelDeleted(listener: (event: ChannelDeletedEvent) => void): () => void {
    this.deletedListeners.add(listener);
    return () => {
      this.deletedListeners.delete(listener);
    };
  }

  private async enter(method: GatewayMethod, target: string): Promise<void> {
    this.calls.push(`${method}:${target}`);

    const gate = this.gates.get(method);
    if (gate) {
      await gate;
    }

    const failure = this.failures.get(method)?.shift();
    if (failure) {
      throw new PlatformError(failure, `${method} failed (${failure})`);
    }
  }

  private existing(channelId: string): FakeChannel {
    const channel = this.channels.get(channelId);
    if (!channel) {
      throw new PlatformError("unknown-channel", `Unknown channel ${channelId}`);
    }
    return channel;
  }
}

/** MemoryStore whose next commits can be made to fail. */
export class FlakyStore extends MemoryStore {
  private failingCommits = 0;
  public readonly commits: StoreWrite[][] = [];

  public failNextCommit(times = 1): void {
    this.failingCommits = times;
  }

  public override async commit(writes: StoreWrite[]): Promise<void> {
    if (this.failingCommits > 0) {
      this.failingCommits -= 1;
      throw new Error("disk I/O error");
    }
    this.commits.push(writes);
    await super.commit(writes);
  }
}

export interface Harness {
  store: FlakyStore;
  gateway: FakeGateway;
  coordinator: LifecycleCoordinator;
  clock: { now: Date; advance: (ms: number) => void };
  categoryId: string;
  incubatorId: string;
  arrive: (userId: string, displayName?: string) => Promise<MembershipOutcome>;
  leave: (userId: string) => Promise<MembershipOutcome>;
}

export interface HarnessOptions {
  store?: FlakyStore;
  gateway?: FakeGateway;
  lockTimeoutMs?: number;
  createDebounceMs?: number;
  auditLogMaxCount?: number;
  skipSetup?: boolean;
}

export const silentLogger = pino({ level: "silent" });

export const createCoordinator = (
  store: CoordinatorStore,
  gateway: PlatformGateway,
  options: HarnessOptions = {},
  now: () => Date = () => new Date()
): LifecycleCoordinator => {
  return new LifecycleCoordinator({
    store,
    gateway,
    logger: silentLogger,
    lockTimeoutMs: options.lockTimeoutMs ?? 1_000,
    createDebounceMs: options.createDebounceMs ?? 5_000,
    auditLogMaxCount: options.auditLogMaxCount,
    now
  });
};

/**
 * Coordinator over a FlakyStore and FakeGateway, with guild g1 set up by
 * "admin" unless skipSetup is passed.
 */
export const createHarness = async (options: HarnessOptions = {}): Promise<Harness> => {
  const store = options.store ?? new FlakyStore();
  const gateway = options.gateway ?? new FakeGateway();
  const clock = {
    now: new Date("2026-03-01T12:00:00.000Z"),
    advance(ms: number): void {
      clock.now = new Date(clock.now.getTime() + ms);
    }
  };
  const coordinator = createCoordinator(store, gateway, options, () => clock.now);

  let categoryId = "";
  let incubatorId = "";
  if (!options.skipSetup) {
    const setup = await coordinator.setup(GUILD_ID, ADMIN_ID, "Temporary Channels", "Join to Create");
    if (!setup.ok || setup.value.config.categoryId === null || setup.value.config.incubatorChannelId === null) {
      throw new Error("Harness setup failed");
    }
    categoryId = setup.value.config.categoryId;
    incubatorId = setup.value.config.incubatorChannelId;
  }

  const arrive = (userId: string, displayName = userId): Promise<MembershipOutcome> => {
    const from = gateway.place(userId, incubatorId);
    return coordinator.handleMemberMoved({
      guildId: GUILD_ID,
      userId,
      displayName,
      isBot: false,
      fromChannelId: from,
      toChannelId: incubatorId
    });
  };

  const leave = (userId: string): Promise<MembershipOutcome> => {
    const from = gateway.place(userId, null);
    return coordinator.handleMemberMoved({
      guildId: GUILD_ID,
      userId,
      displayName: userId,
      isBot: false,
      fromChannelId: from,
      toChannelId: null
    });
  };

  return { store, gateway, coordinator, clock, categoryId, incubatorId, arrive, leave };
};

/** Channel id created for a member by their last arrival. */
export const createdChannelId = (outcome: MembershipOutcome): string => {
  const arrival = outcome.arrival;
  if (!arrival || !arrival.ok || arrival.value.kind !== "created") {
    throw new Error(`Expected a created channel, got ${JSON.stringify(arrival)}`);
  }
  return arrival.value.channel.channelId;
};
