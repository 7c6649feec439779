// Lifecycle coordinator for temporary voice channels: provisions a channel when a
// member enters the incubator, tears it down once empty, and serializes every
// mutation of a channel behind that channel's section.

import type { Logger } from "pino";
import {
  MAX_CHANNEL_NAME_LENGTH,
  MAX_USER_LIMIT,
  isValidUserLimit,
  normalizeChannelName,
  resolveChannelSettings
} from "../../shared/src/channel-settings.js";
import type {
  AuditEntry,
  AuditOutcome,
  ChannelDefaults,
  ChannelListing,
  GuildConfig,
  TemporaryChannel
} from "../../shared/src/types.js";
import type { Command } from "./commands.js";
import {
  OperationError,
  PlatformError,
  StoreUnavailableError,
  describeError,
  isUnknownChannel,
  type FailureReason,
  type Outcome
} from "./errors.js";
import type {
  ChannelDeletedEvent,
  MemberMovedEvent,
  PlatformChannel,
  PlatformGateway
} from "./gateway.js";
import { KeyedLock, LockTimeoutError } from "./keyed-lock.js";
import type { CoordinatorStore, NewAuditEntry, StoreWrite } from "./store.js";

export const DEFAULT_LOCK_TIMEOUT_MS = 10_000;
export const DEFAULT_CREATE_DEBOUNCE_MS = 5_000;
export const DEFAULT_AUDIT_LOG_COUNT = 10;
export const DEFAULT_AUDIT_LOG_MAX = 50;

export interface CoordinatorOptions {
  store: CoordinatorStore;
  gateway: PlatformGateway;
  logger: Logger;
  lockTimeoutMs?: number;
  // Join events for a member whose channel is younger than this are treated as redelivery.
  createDebounceMs?: number;
  auditLogMaxCount?: number;
  now?: () => Date;
}

export type ProvisionResult =
  | { kind: "ignored" }
  | { kind: "created"; channel: TemporaryChannel }
  | { kind: "duplicate"; channelId: string }
  | { kind: "moved-to-existing"; channelId: string };

export type TeardownStatus = "absent" | "occupied" | "deleted" | "removed-missing";

export type TeardownResult = {
  kind: "teardown";
  channelId: string;
  status: TeardownStatus;
};

export type TeardownTrigger = "departure" | "sweep" | "startup";

export interface MembershipOutcome {
  departure: Outcome<TeardownResult> | null;
  arrival: Outcome<ProvisionResult> | null;
}

export type SetupResult = {
  kind: "setup";
  status: "created" | "repaired" | "unchanged";
  config: GuildConfig;
};

export type ConfigResult = {
  kind: "config";
  config: GuildConfig;
};

export type RenameResult = {
  kind: "renamed";
  target: "incubator" | "category";
  channelId: string;
  name: string;
};

export type DefaultsResult = {
  kind: "defaults";
  defaults: Partial<ChannelDefaults>;
};

export type PreferenceResult = {
  kind: "preference";
  mode: "live" | "preference-only";
  channelId: string | null;
  preference: Partial<ChannelDefaults>;
};

export type ChannelStateResult = {
  kind: "channel";
  channel: TemporaryChannel;
};

export type ListResult = {
  kind: "list";
  channels: ChannelListing[];
};

export type AuditLogResult = {
  kind: "auditlog";
  entries: AuditEntry[];
};

export type CommandValue =
  | SetupResult
  | ConfigResult
  | RenameResult
  | DefaultsResult
  | PreferenceResult
  | ChannelStateResult
  | ListResult
  | AuditLogResult;

export interface SweepReport {
  deleted: string[];
  failed: Array<{ channelId: string; reason: FailureReason }>;
}

export interface ReconcileReport {
  pruned: string[];
  tornDown: string[];
  skipped: string[];
}

type AuditInput = Omit<NewAuditEntry, "timestamp" | "outcome"> & { outcome?: AuditOutcome };

type PreferenceChange = {
  operation: "name" | "limit";
  guildId: string;
  actorId: string;
  channelId: string | null;
  patch: Partial<ChannelDefaults>;
  applyLive: (channelId: string) => Promise<void>;
  liveAudit: Pick<AuditInput, "action" | "details">;
  defaultAudit: Pick<AuditInput, "action" | "details">;
};

const INVALID_NAME = `Channel names must be 1-${MAX_CHANNEL_NAME_LENGTH} characters`;
const INVALID_LIMIT = `User limit must be a whole number from 0 to ${MAX_USER_LIMIT}`;

const channelKey = (channelId: string): string => `channel:${channelId}`;
const guildKey = (guildId: string): string => `guild:${guildId}`;
const memberKey = (guildId: string, userId: string): string => `member:${guildId}:${userId}`;

const toFailure = (error: unknown): { reason: FailureReason; message: string } | null => {
  if (error instanceof OperationError) {
    return { reason: error.reason, message: error.message };
  }
  if (error instanceof LockTimeoutError) {
    return { reason: "busy", message: error.message };
  }
  if (error instanceof StoreUnavailableError) {
    return { reason: "store-unavailable", message: error.message };
  }
  if (error instanceof PlatformError) {
    switch (error.reason) {
      case "forbidden":
        return { reason: "forbidden", message: error.message };
      case "unknown-channel":
        return { reason: "not-tracked", message: `Channel no longer exists on the platform: ${error.message}` };
      case "platform-unavailable":
        return { reason: "platform-unavailable", message: error.message };
    }
  }

  return null;
};

export class LifecycleCoordinator {
  private readonly store: CoordinatorStore;
  private readonly gateway: PlatformGateway;
  private readonly logger: Logger;
  private readonly locks = new KeyedLock();
  private readonly lockTimeoutMs: number;
  private readonly createDebounceMs: number;
  private readonly auditLogMaxCount: number;
  private readonly now: () => Date;

  public constructor(options: CoordinatorOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.logger = options.logger.child({ component: "coordinator" });
    this.lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    this.createDebounceMs = options.createDebounceMs ?? DEFAULT_CREATE_DEBOUNCE_MS;
    this.auditLogMaxCount = options.auditLogMaxCount ?? DEFAULT_AUDIT_LOG_MAX;
    this.now = options.now ?? (() => new Date());
  }

  public activeSectionCount(): number {
    return this.locks.activeKeyCount();
  }

  // ── Single typed entry point for the command surface ──

  public execute(command: Command): Promise<Outcome<CommandValue>> {
    switch (command.type) {
      case "setup":
        return this.setup(command.guildId, command.actorId, command.categoryName, command.incubatorName);
      case "edit.rename":
        return this.editRename(command.guildId, command.actorId, command.target, command.name);
      case "edit.select":
        return this.editSelect(command.guildId, command.actorId, {
          categoryId: command.categoryId,
          incubatorChannelId: command.incubatorChannelId
        });
      case "edit.cleanup":
        return this.editCleanup(command.guildId, command.actorId, command.enabled);
      case "defaults":
        return this.setDefaults(command.guildId, command.actorId, { name: command.name, limit: command.limit });
      case "name":
        return this.setName(command.guildId, command.actorId, command.channelId, command.name);
      case "limit":
        return this.setLimit(command.guildId, command.actorId, command.channelId, command.limit);
      case "lock":
        return this.lock(command.guildId, command.channelId, command.actorId);
      case "unlock":
        return this.unlock(command.guildId, command.channelId, command.actorId);
      case "permit":
        return this.permit(command.guildId, command.channelId, command.actorId, command.targetUserId);
      case "claim":
        return this.claim(command.guildId, command.channelId, command.actorId);
      case "list":
        return this.list(command.guildId);
      case "auditlog":
        return this.auditLog(command.guildId, command.count);
    }
  }

  // ── Platform events ──

  public async handleMemberMoved(event: MemberMovedEvent): Promise<MembershipOutcome> {
    if (event.isBot || event.fromChannelId === event.toChannelId) {
      return { departure: null, arrival: null };
    }

    // The departure settles before the arrival is looked at: an owner moving
    // from their channel to the incubator must not be matched to the channel
    // that is being torn down behind them.
    const departure = event.fromChannelId
      ? await this.teardown(event.fromChannelId, { trigger: "departure", leaverId: event.userId })
      : null;
    const arrival = event.toChannelId ? await this.provision(event) : null;

    return { departure, arrival };
  }

  public handleChannelDeleted(event: ChannelDeletedEvent): Promise<Outcome<boolean>> {
    return this.forget(event.channelId, "Channel was deleted on the platform");
  }

  // ── Creation ──

  public provision(event: MemberMovedEvent): Promise<Outcome<ProvisionResult>> {
    return this.guarded("provision", async (): Promise<ProvisionResult> => {
      const config = await this.read(() => this.store.getGuildConfig(event.guildId));
      if (!config || config.incubatorChannelId === null || config.incubatorChannelId !== event.toChannelId) {
        return { kind: "ignored" };
      }

      return this.section(memberKey(event.guildId, event.userId), () => this.provisionLocked(event, config));
    });
  }

  private async provisionLocked(event: MemberMovedEvent, config: GuildConfig): Promise<ProvisionResult> {
    const { guildId, userId } = event;

    if (config.categoryId === null) {
      await this.auditBestEffort({
        guildId,
        actorId: userId,
        action: "config-error",
        channelId: null,
        details: "No category is configured for temporary channels"
      });
      throw new OperationError("invalid-configuration", "No category is configured for temporary channels");
    }

    const owned = await this.read(() => this.store.findChannelsByOwner(guildId, userId));
    const newest = owned[owned.length - 1];
    if (newest) {
      const reused = await this.reuseOwnedChannel(event, newest);
      if (reused) {
        return reused;
      }
    }

    const [preference, guildDefaults] = await Promise.all([
      this.read(() => this.store.getUserPreference(guildId, userId)),
      this.read(() => this.store.getGuildDefaults(guildId))
    ]);
    const settings = resolveChannelSettings(event.displayName, preference, guildDefaults);

    let channelId: string;
    try {
      channelId = await this.gateway.createChannel({
        guildId,
        categoryId: config.categoryId,
        name: settings.name,
        limit: settings.limit,
        ownerId: userId
      });
    } catch (error) {
      await this.auditBestEffort({
        guildId,
        actorId: userId,
        action: "channel-creation-failed",
        channelId: null,
        details: describeError(error)
      });
      throw error;
    }

    return this.section(channelKey(channelId), async () => {
      const channel: TemporaryChannel = {
        channelId,
        guildId,
        ownerId: userId,
        locked: false,
        permittedUserIds: [],
        createdAt: this.now().toISOString()
      };

      try {
        await this.persist([
          { type: "insert-channel", channel },
          this.auditWrite({
            guildId,
            actorId: userId,
            action: "channel-created",
            channelId,
            details: `Created '${settings.name}' with limit ${settings.limit}`
          })
        ]);
      } catch (error) {
        await this.deletePlatformChannelOnce(channelId);
        throw error;
      }

      try {
        await this.gateway.moveMember(guildId, userId, channelId);
      } catch (error) {
        await this.discardUnusedChannel(channel, error);
        throw error;
      }

      this.logger.info({ event: "channel.created", guildId, channelId, ownerId: userId });
      return { kind: "created", channel };
    });
  }

  /**
   * Runs inside the owned channel's section and re-reads its row, so a
   * teardown that is already deleting the channel finishes first. Returns
   * null when the member needs a new channel.
   */
  private reuseOwnedChannel(event: MemberMovedEvent, owned: TemporaryChannel): Promise<ProvisionResult | null> {
    const { guildId, userId } = event;

    return this.section(channelKey(owned.channelId), async (): Promise<ProvisionResult | null> => {
      const row = await this.read(() => this.store.getChannel(owned.channelId));
      if (!row) {
        return null;
      }

      const age = this.now().getTime() - Date.parse(row.createdAt);
      if (age < this.createDebounceMs) {
        this.logger.debug({ event: "channel.duplicate-join", guildId, userId, channelId: row.channelId });
        return { kind: "duplicate", channelId: row.channelId };
      }

      const live = await this.gateway.fetchChannel(row.channelId);
      if (!live) {
        await this.forgetLocked(row.channelId, "Owned channel no longer exists on the platform");
        return null;
      }

      await this.gateway.moveMember(guildId, userId, row.channelId);
      await this.persist([
        this.auditWrite({
          guildId,
          actorId: userId,
          action: "moved-to-existing",
          channelId: row.channelId,
          details: `Moved back to their channel '${live.name}'`
        })
      ]);
      return { kind: "moved-to-existing", channelId: row.channelId };
    });
  }

  private async discardUnusedChannel(channel: TemporaryChannel, cause: unknown): Promise<void> {
    await this.deletePlatformChannelOnce(channel.channelId);

    try {
      await this.persist([
        { type: "delete-channel", channelId: channel.channelId },
        this.auditWrite({
          guildId: channel.guildId,
          actorId: channel.ownerId,
          action: "channel-creation-failed",
          channelId: channel.channelId,
          outcome: "failure",
          details: `Could not move the member into the channel: ${describeError(cause)}`
        })
      ]);
    } catch (error) {
      this.logger.error({
        event: "channel.discard-failed",
        channelId: channel.channelId,
        message: describeError(error)
      });
    }
  }

  private async deletePlatformChannelOnce(channelId: string): Promise<void> {
    try {
      await this.gateway.deleteChannel(channelId);
    } catch (error) {
      if (isUnknownChannel(error)) {
        return;
      }
      this.logger.error({ event: "channel.compensation-failed", channelId, message: describeError(error) });
    }
  }

  // ── Teardown ──

  public teardown(
    channelId: string,
    options: { trigger: TeardownTrigger; leaverId?: string } = { trigger: "sweep" }
  ): Promise<Outcome<TeardownResult>> {
    return this.guarded("teardown", () =>
      this.section(channelKey(channelId), () => this.teardownLocked(channelId, options.trigger, options.leaverId))
    );
  }

  private async teardownLocked(
    channelId: string,
    trigger: TeardownTrigger,
    leaverId: string | undefined
  ): Promise<TeardownResult> {
    const row = await this.read(() => this.store.getChannel(channelId));
    if (!row) {
      return { kind: "teardown", channelId, status: "absent" };
    }

    const departure: StoreWrite[] = leaverId
      ? [
          this.auditWrite({
            guildId: row.guildId,
            actorId: leaverId,
            action: "member-left",
            channelId,
            details: leaverId === row.ownerId ? "Owner left the channel" : "Member left the channel"
          })
        ]
      : [];

    let members: ReadonlySet<string> | null;
    try {
      members = await this.gateway.currentMembers(channelId);
    } catch (error) {
      if (!isUnknownChannel(error)) {
        throw error;
      }
      members = null;
    }

    if (members === null) {
      await this.persist([
        ...departure,
        { type: "delete-channel", channelId },
        this.auditWrite({
          guildId: row.guildId,
          actorId: null,
          action: "channel-deleted",
          channelId,
          details: "Channel was already removed on the platform"
        })
      ]);
      return { kind: "teardown", channelId, status: "removed-missing" };
    }

    if (members.size > 0) {
      if (departure.length > 0) {
        await this.persist(departure);
      }
      return { kind: "teardown", channelId, status: "occupied" };
    }

    try {
      await this.gateway.deleteChannel(channelId);
    } catch (error) {
      if (!isUnknownChannel(error)) {
        await this.auditBestEffort({
          guildId: row.guildId,
          actorId: null,
          action: "channel-delete-failed",
          channelId,
          details: describeError(error)
        });
        throw error;
      }
    }

    // A crash between the platform delete and this commit leaves a row that
    // reconcile() removes on the next start.
    await this.persist([
      ...departure,
      { type: "delete-channel", channelId },
      this.auditWrite({
        guildId: row.guildId,
        actorId: null,
        action: "channel-deleted",
        channelId,
        details: `Empty temporary channel deleted (${trigger})`
      })
    ]);

    this.logger.info({ event: "channel.deleted", guildId: row.guildId, channelId, trigger });
    return { kind: "teardown", channelId, status: "deleted" };
  }

  public sweep(guildId?: string): Promise<Outcome<SweepReport>> {
    return this.guarded("sweep", async () => {
      const rows = await this.read(() => this.store.listChannels(guildId));
      const outcomes = await Promise.all(rows.map((row) => this.teardown(row.channelId, { trigger: "sweep" })));
      const report: SweepReport = { deleted: [], failed: [] };

      outcomes.forEach((outcome, index) => {
        const channelId = rows[index].channelId;
        if (!outcome.ok) {
          report.failed.push({ channelId, reason: outcome.reason });
          return;
        }
        if (outcome.value.status === "deleted" || outcome.value.status === "removed-missing") {
          report.deleted.push(channelId);
        }
      });

      return report;
    });
  }

  // ── Ownership ──

  public claim(guildId: string, channelId: string, requesterId: string): Promise<Outcome<ChannelStateResult>> {
    return this.guarded("claim", () =>
      this.section(channelKey(channelId), async (): Promise<ChannelStateResult> => {
        const row = await this.requireTracked(guildId, channelId);
        const members = await this.gateway.currentMembers(channelId);

        if (row.ownerId !== null && members.has(row.ownerId)) {
          throw new OperationError("not-ownerless", "The current owner is still in the channel");
        }
        if (!members.has(requesterId)) {
          throw new OperationError("not-present", "You must be in the channel to claim it");
        }

        await this.gateway.setManager(channelId, requesterId, true);

        const previousOwnerId = row.ownerId;
        if (previousOwnerId !== null && previousOwnerId !== requesterId) {
          try {
            await this.gateway.setManager(channelId, previousOwnerId, false);
          } catch (error) {
            if (!(error instanceof PlatformError)) {
              throw error;
            }
            this.logger.warn({ event: "claim.revoke-failed", channelId, previousOwnerId, message: error.message });
          }
        }

        const channel: TemporaryChannel = { ...row, ownerId: requesterId };
        await this.persist([
          { type: "update-channel", channelId, patch: { ownerId: requesterId } },
          this.auditWrite({
            guildId,
            actorId: requesterId,
            action: "channel-claimed",
            channelId,
            details: `Claimed from ${previousOwnerId ?? "no owner"}`
          })
        ]);

        return { kind: "channel", channel };
      })
    );
  }

  // ── Access control ──

  public lock(guildId: string, channelId: string, actorId: string): Promise<Outcome<ChannelStateResult>> {
    return this.guarded("lock", () =>
      this.section(channelKey(channelId), async (): Promise<ChannelStateResult> => {
        const row = await this.requireOwned(guildId, channelId, actorId);

        await this.gateway.setPermission(channelId, { kind: "everyone" }, false);
        try {
          for (const userId of row.permittedUserIds) {
            await this.gateway.setPermission(channelId, { kind: "member", userId }, true);
          }
        } catch (error) {
          // The row still says unlocked; put the platform back in line with it.
          await this.reopenChannel(channelId);
          throw error;
        }

        await this.persist([
          { type: "update-channel", channelId, patch: { locked: true } },
          this.auditWrite({ guildId, actorId, action: "channel-locked", channelId, details: null })
        ]);

        return { kind: "channel", channel: { ...row, locked: true } };
      })
    );
  }

  private async reopenChannel(channelId: string): Promise<void> {
    try {
      await this.gateway.setPermission(channelId, { kind: "everyone" }, true);
    } catch (error) {
      this.logger.error({ event: "lock.rollback-failed", channelId, message: describeError(error) });
    }
  }

  public unlock(guildId: string, channelId: string, actorId: string): Promise<Outcome<ChannelStateResult>> {
    return this.guarded("unlock", () =>
      this.section(channelKey(channelId), async (): Promise<ChannelStateResult> => {
        const row = await this.requireOwned(guildId, channelId, actorId);

        await this.gateway.setPermission(channelId, { kind: "everyone" }, true);

        await this.persist([
          { type: "update-channel", channelId, patch: { locked: false } },
          this.auditWrite({ guildId, actorId, action: "channel-unlocked", channelId, details: null })
        ]);

        return { kind: "channel", channel: { ...row, locked: false } };
      })
    );
  }

  public permit(
    guildId: string,
    channelId: string,
    actorId: string,
    targetUserId: string
  ): Promise<Outcome<ChannelStateResult>> {
    return this.guarded("permit", () =>
      this.section(channelKey(channelId), async (): Promise<ChannelStateResult> => {
        const row = await this.requireOwned(guildId, channelId, actorId);

        await this.gateway.setPermission(channelId, { kind: "member", userId: targetUserId }, true);

        const permittedUserIds = row.permittedUserIds.includes(targetUserId)
          ? row.permittedUserIds
          : [...row.permittedUserIds, targetUserId];

        await this.persist([
          { type: "update-channel", channelId, patch: { permittedUserIds } },
          this.auditWrite({
            guildId,
            actorId,
            action: "channel-permitted",
            channelId,
            details: `Permitted ${targetUserId}`
          })
        ]);

        return { kind: "channel", channel: { ...row, permittedUserIds } };
      })
    );
  }

  // ── Name and limit ──

  public setName(
    guildId: string,
    actorId: string,
    channelId: string | null,
    value: string
  ): Promise<Outcome<PreferenceResult>> {
    const name = normalizeChannelName(value);
    if (name === null) {
      return this.rejected<PreferenceResult>("name", "invalid-value", INVALID_NAME);
    }

    return this.changePreference({
      operation: "name",
      guildId,
      actorId,
      channelId,
      patch: { name },
      applyLive: (liveChannelId) => this.gateway.renameChannel(liveChannelId, name),
      liveAudit: { action: "channel-renamed", details: `Renamed to '${name}'` },
      defaultAudit: { action: "default-name-set", details: `Default channel name set to '${name}'` }
    });
  }

  public setLimit(
    guildId: string,
    actorId: string,
    channelId: string | null,
    limit: number
  ): Promise<Outcome<PreferenceResult>> {
    if (!isValidUserLimit(limit)) {
      return this.rejected<PreferenceResult>("limit", "invalid-value", INVALID_LIMIT);
    }

    return this.changePreference({
      operation: "limit",
      guildId,
      actorId,
      channelId,
      patch: { limit },
      applyLive: (liveChannelId) => this.gateway.setLimit(liveChannelId, limit),
      liveAudit: { action: "channel-limit-changed", details: `User limit set to ${limit}` },
      defaultAudit: { action: "default-limit-set", details: `Default user limit set to ${limit}` }
    });
  }

  private changePreference(change: PreferenceChange): Promise<Outcome<PreferenceResult>> {
    const { guildId, actorId, channelId, patch } = change;
    const preferenceWrite: StoreWrite = { type: "save-user-preference", guildId, userId: actorId, patch };
    const defaultAudit = this.auditWrite({ guildId, actorId, channelId: null, ...change.defaultAudit });

    const savePreferenceOnly = async (): Promise<PreferenceResult> => {
      await this.persist([preferenceWrite, defaultAudit]);
      return { kind: "preference", mode: "preference-only", channelId: null, preference: patch };
    };

    if (channelId === null) {
      return this.guarded(change.operation, savePreferenceOnly);
    }

    return this.guarded(change.operation, () =>
      this.section(channelKey(channelId), async (): Promise<PreferenceResult> => {
        const row = await this.read(() => this.store.getChannel(channelId));
        if (!row || row.guildId !== guildId || row.ownerId !== actorId) {
          return savePreferenceOnly();
        }

        await change.applyLive(channelId);
        await this.persist([
          preferenceWrite,
          this.auditWrite({ guildId, actorId, channelId, ...change.liveAudit }),
          defaultAudit
        ]);

        return { kind: "preference", mode: "live", channelId, preference: patch };
      })
    );
  }

  public setDefaults(
    guildId: string,
    actorId: string,
    values: { name?: string; limit?: number }
  ): Promise<Outcome<DefaultsResult>> {
    const defaults: Partial<ChannelDefaults> = {};

    if (values.name !== undefined) {
      const name = normalizeChannelName(values.name);
      if (name === null) {
        return this.rejected<DefaultsResult>("defaults", "invalid-value", INVALID_NAME);
      }
      defaults.name = name;
    }

    if (values.limit !== undefined) {
      if (!isValidUserLimit(values.limit)) {
        return this.rejected<DefaultsResult>("defaults", "invalid-value", INVALID_LIMIT);
      }
      defaults.limit = values.limit;
    }

    return this.guarded("defaults", () =>
      this.section(guildKey(guildId), async (): Promise<DefaultsResult> => {
        await this.persist([
          { type: "save-guild-defaults", guildId, patch: defaults },
          this.auditWrite({
            guildId,
            actorId,
            action: "defaults-set",
            channelId: null,
            details: JSON.stringify(defaults)
          })
        ]);

        return { kind: "defaults", defaults };
      })
    );
  }

  // ── Guild configuration ──

  public setup(
    guildId: string,
    actorId: string,
    categoryName: string,
    incubatorName: string
  ): Promise<Outcome<SetupResult>> {
    const category = normalizeChannelName(categoryName);
    const incubator = normalizeChannelName(incubatorName);
    if (category === null || incubator === null) {
      return this.rejected<SetupResult>("setup", "invalid-value", INVALID_NAME);
    }

    return this.guarded("setup", () =>
      this.section(guildKey(guildId), async (): Promise<SetupResult> => {
        const existing = await this.read(() => this.store.getGuildConfig(guildId));

        return existing
          ? this.repairSetup(existing, actorId, category, incubator)
          : this.createSetup(guildId, actorId, category, incubator);
      })
    );
  }

  private async createSetup(
    guildId: string,
    actorId: string,
    categoryName: string,
    incubatorName: string
  ): Promise<SetupResult> {
    const categoryId = await this.gateway.createCategory(guildId, categoryName);

    let incubatorChannelId: string;
    try {
      incubatorChannelId = await this.gateway.createChannel({
        guildId,
        categoryId,
        name: incubatorName,
        limit: 0,
        ownerId: null
      });
    } catch (error) {
      await this.deletePlatformChannelOnce(categoryId);
      throw error;
    }

    const config: GuildConfig = { guildId, ownerId: actorId, categoryId, incubatorChannelId, cleanupOnStartup: true };

    try {
      await this.persist([
        { type: "save-guild-config", config },
        this.auditWrite({
          guildId,
          actorId,
          action: "setup",
          channelId: incubatorChannelId,
          details: `Category '${categoryName}' (${categoryId}), incubator '${incubatorName}' (${incubatorChannelId})`
        })
      ]);
    } catch (error) {
      await this.deletePlatformChannelOnce(incubatorChannelId);
      await this.deletePlatformChannelOnce(categoryId);
      throw error;
    }

    this.logger.info({ event: "guild.setup", guildId, categoryId, incubatorChannelId });
    return { kind: "setup", status: "created", config };
  }

  private async repairSetup(
    existing: GuildConfig,
    actorId: string,
    categoryName: string,
    incubatorName: string
  ): Promise<SetupResult> {
    const { guildId } = existing;
    const repairs: string[] = [];
    let { categoryId, incubatorChannelId } = existing;

    const category = categoryId ? await this.gateway.fetchChannel(categoryId) : null;
    if (!categoryId || !category || category.kind !== "category") {
      categoryId = await this.gateway.createCategory(guildId, categoryName);
      repairs.push(`category recreated as ${categoryId}`);
    }

    const incubator = incubatorChannelId ? await this.gateway.fetchChannel(incubatorChannelId) : null;
    if (!incubator || incubator.kind !== "voice" || incubator.parentId !== categoryId) {
      incubatorChannelId = await this.gateway.createChannel({
        guildId,
        categoryId,
        name: incubatorName,
        limit: 0,
        ownerId: null
      });
      repairs.push(`incubator recreated as ${incubatorChannelId}`);
    }

    if (repairs.length === 0) {
      return { kind: "setup", status: "unchanged", config: existing };
    }

    const config: GuildConfig = { ...existing, categoryId, incubatorChannelId };
    await this.persist([
      { type: "save-guild-config", config },
      this.auditWrite({
        guildId,
        actorId,
        action: "setup-repaired",
        channelId: incubatorChannelId,
        details: repairs.join("; ")
      })
    ]);

    this.logger.info({ event: "guild.setup-repaired", guildId, repairs });
    return { kind: "setup", status: "repaired", config };
  }

  public editRename(
    guildId: string,
    actorId: string,
    target: "incubator" | "category",
    value: string
  ): Promise<Outcome<RenameResult>> {
    const name = normalizeChannelName(value);
    if (name === null) {
      return this.rejected<RenameResult>("edit.rename", "invalid-value", INVALID_NAME);
    }

    return this.guarded("edit.rename", () =>
      this.section(guildKey(guildId), async (): Promise<RenameResult> => {
        const config = await this.requireConfig(guildId);
        await this.checkLayout(guildId, config.categoryId, config.incubatorChannelId);

        const channelId = target === "incubator" ? config.incubatorChannelId : config.categoryId;
        if (channelId === null) {
          throw new OperationError("invalid-configuration", `No ${target} is configured`);
        }

        await this.gateway.renameChannel(channelId, name);
        await this.persist([
          this.auditWrite({
            guildId,
            actorId,
            action: target === "incubator" ? "incubator-renamed" : "category-renamed",
            channelId,
            details: `Renamed to '${name}'`
          })
        ]);

        return { kind: "renamed", target, channelId, name };
      })
    );
  }

  public editSelect(
    guildId: string,
    actorId: string,
    selection: { categoryId?: string; incubatorChannelId?: string | null }
  ): Promise<Outcome<ConfigResult>> {
    return this.guarded("edit.select", () =>
      this.section(guildKey(guildId), async (): Promise<ConfigResult> => {
        const current = await this.requireConfig(guildId);
        const config: GuildConfig = {
          ...current,
          categoryId: selection.categoryId ?? current.categoryId,
          incubatorChannelId:
            selection.incubatorChannelId !== undefined ? selection.incubatorChannelId : current.incubatorChannelId
        };

        await this.checkLayout(guildId, config.categoryId, config.incubatorChannelId);

        const writes: StoreWrite[] = [];
        if (config.categoryId !== current.categoryId) {
          writes.push(
            this.auditWrite({
              guildId,
              actorId,
              action: "category-changed",
              channelId: config.categoryId,
              details: `Category changed from ${current.categoryId ?? "none"}`
            })
          );
        }
        if (config.incubatorChannelId !== current.incubatorChannelId) {
          writes.push(
            this.auditWrite({
              guildId,
              actorId,
              action: "incubator-changed",
              channelId: config.incubatorChannelId,
              details: config.incubatorChannelId === null
                ? "Incubator disabled"
                : `Incubator changed from ${current.incubatorChannelId ?? "none"}`
            })
          );
        }

        if (writes.length > 0) {
          await this.persist([{ type: "save-guild-config", config }, ...writes]);
        }

        return { kind: "config", config };
      })
    );
  }

  public editCleanup(guildId: string, actorId: string, enabled: boolean): Promise<Outcome<ConfigResult>> {
    return this.guarded("edit.cleanup", () =>
      this.section(guildKey(guildId), async (): Promise<ConfigResult> => {
        const current = await this.requireConfig(guildId);
        const config: GuildConfig = { ...current, cleanupOnStartup: enabled };

        await this.persist([
          { type: "save-guild-config", config },
          this.auditWrite({
            guildId,
            actorId,
            action: "cleanup-changed",
            channelId: null,
            details: enabled ? "Startup cleanup enabled" : "Startup cleanup disabled"
          })
        ]);

        return { kind: "config", config };
      })
    );
  }

  // ── Queries ──

  /** Snapshot of the guild's channels. Member counts are read without a section and may be stale. */
  public list(guildId: string): Promise<Outcome<ListResult>> {
    return this.guarded("list", async (): Promise<ListResult> => {
      const rows = await this.read(() => this.store.listChannels(guildId));
      const channels = await Promise.all(
        rows.map(async (channel): Promise<ChannelListing> => ({
          channel,
          memberCount: await this.countMembers(channel.channelId)
        }))
      );

      return { kind: "list", channels };
    });
  }

  public auditLog(guildId: string, count?: number): Promise<Outcome<AuditLogResult>> {
    const requested = Math.trunc(count ?? DEFAULT_AUDIT_LOG_COUNT);
    const clamped = Math.min(Math.max(requested, 1), this.auditLogMaxCount);

    return this.guarded("auditlog", async (): Promise<AuditLogResult> => {
      const entries = await this.read(() => this.store.latestAuditEntries(guildId, clamped));
      return { kind: "auditlog", entries };
    });
  }

  // ── Recovery ──

  /**
   * Drop registry rows whose platform channel is gone, then tear down empty
   * channels in guilds that ask for startup cleanup.
   */
  public reconcile(): Promise<Outcome<ReconcileReport>> {
    return this.guarded("reconcile", async (): Promise<ReconcileReport> => {
      const rows = await this.read(() => this.store.listChannels());
      const report: ReconcileReport = { pruned: [], tornDown: [], skipped: [] };
      const survivors: TemporaryChannel[] = [];

      for (const row of rows) {
        let live: PlatformChannel | null;
        try {
          live = await this.gateway.fetchChannel(row.channelId);
        } catch (error) {
          if (!(error instanceof PlatformError)) {
            throw error;
          }
          this.logger.warn({ event: "reconcile.lookup-failed", channelId: row.channelId, message: error.message });
          report.skipped.push(row.channelId);
          continue;
        }

        if (live && live.kind === "voice") {
          survivors.push(row);
          continue;
        }

        const pruned = await this.forget(row.channelId, "Registry row had no live platform channel");
        if (pruned.ok && pruned.value) {
          report.pruned.push(row.channelId);
        }
      }

      const cleanupByGuild = new Map<string, boolean>();
      for (const row of survivors) {
        let cleanup = cleanupByGuild.get(row.guildId);
        if (cleanup === undefined) {
          const config = await this.read(() => this.store.getGuildConfig(row.guildId));
          cleanup = config?.cleanupOnStartup ?? false;
          cleanupByGuild.set(row.guildId, cleanup);
        }
        if (!cleanup) {
          continue;
        }

        const outcome = await this.teardown(row.channelId, { trigger: "startup" });
        if (outcome.ok && outcome.value.status === "deleted") {
          report.tornDown.push(row.channelId);
        }
      }

      this.logger.info({ event: "reconcile.finished", ...report });
      return report;
    });
  }

  private forget(channelId: string, details: string): Promise<Outcome<boolean>> {
    return this.guarded("forget", () =>
      this.section(channelKey(channelId), () => this.forgetLocked(channelId, details))
    );
  }

  private async forgetLocked(channelId: string, details: string): Promise<boolean> {
    const row = await this.read(() => this.store.getChannel(channelId));
    if (!row) {
      return false;
    }

    await this.persist([
      { type: "delete-channel", channelId },
      this.auditWrite({ guildId: row.guildId, actorId: null, action: "reconciled", channelId, details })
    ]);

    this.logger.info({ event: "reconcile.pruned", guildId: row.guildId, channelId });
    return true;
  }

  // ── Helpers ──

  private section<T>(key: string, work: () => Promise<T>): Promise<T> {
    return this.locks.run(key, this.lockTimeoutMs, work);
  }

  private async guarded<T>(operation: string, work: () => Promise<T>): Promise<Outcome<T>> {
    try {
      const value = await work();
      return { ok: true, value };
    } catch (error) {
      const failure = toFailure(error);
      if (!failure) {
        this.logger.error({ event: "operation.crashed", operation, message: describeError(error) });
        throw error;
      }

      const level = failure.reason === "store-unavailable" ? "error" : "warn";
      this.logger[level]({ event: "operation.failed", operation, reason: failure.reason, message: failure.message });
      return { ok: false, ...failure };
    }
  }

  private async rejected<T>(operation: string, reason: FailureReason, message: string): Promise<Outcome<T>> {
    this.logger.debug({ event: "operation.rejected", operation, reason, message });
    return { ok: false, reason, message };
  }

  private async read<T>(query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      throw new StoreUnavailableError(error);
    }
  }

  private async persist(writes: StoreWrite[]): Promise<void> {
    try {
      await this.store.commit(writes);
    } catch (error) {
      throw new StoreUnavailableError(error);
    }
  }

  private auditWrite(input: AuditInput): StoreWrite {
    return {
      type: "append-audit",
      entry: {
        ...input,
        outcome: input.outcome ?? "success",
        timestamp: this.now().toISOString()
      }
    };
  }

  private async auditBestEffort(input: AuditInput): Promise<void> {
    try {
      await this.persist([this.auditWrite({ ...input, outcome: "failure" })]);
    } catch (error) {
      this.logger.error({ event: "audit.write-failed", action: input.action, message: describeError(error) });
    }
  }

  private async countMembers(channelId: string): Promise<number | null> {
    try {
      const members = await this.gateway.currentMembers(channelId);
      return members.size;
    } catch (error) {
      if (!(error instanceof PlatformError)) {
        throw error;
      }
      return null;
    }
  }

  private async requireConfig(guildId: string): Promise<GuildConfig> {
    const config = await this.read(() => this.store.getGuildConfig(guildId));
    if (!config) {
      throw new OperationError("invalid-configuration", "This guild has not been set up yet");
    }
    return config;
  }

  private async requireTracked(guildId: string, channelId: string): Promise<TemporaryChannel> {
    const row = await this.read(() => this.store.getChannel(channelId));
    if (!row || row.guildId !== guildId) {
      throw new OperationError("not-tracked", "This is not a temporary channel managed here");
    }
    return row;
  }

  private async requireOwned(guildId: string, channelId: string, actorId: string): Promise<TemporaryChannel> {
    const row = await this.requireTracked(guildId, channelId);
    if (row.ownerId !== actorId) {
      throw new OperationError("not-owner", "Only the channel owner can do that");
    }
    return row;
  }

  // Incubator, when set, must be a voice channel inside the configured category.
  private async checkLayout(guildId: string, categoryId: string | null, incubatorChannelId: string | null): Promise<void> {
    if (categoryId === null) {
      throw new OperationError("invalid-configuration", "No category is configured");
    }

    const category = await this.gateway.fetchChannel(categoryId);
    if (!category || category.guildId !== guildId || category.kind !== "category") {
      throw new OperationError("invalid-configuration", `Channel ${categoryId} is not a category in this guild`);
    }

    if (incubatorChannelId === null) {
      return;
    }

    const incubator = await this.gateway.fetchChannel(incubatorChannelId);
    if (!incubator || incubator.guildId !== guildId || incubator.kind !== "voice") {
      throw new OperationError("invalid-configuration", `Channel ${incubatorChannelId} is not a voice channel in this guild`);
    }
    if (incubator.parentId !== categoryId) {
      throw new OperationError("invalid-configuration", "The incubator channel must sit inside the configured category");
    }
  }
}
