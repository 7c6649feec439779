// Type definitions and runtime guards for the command surface consumed by a command router.

type CommandBase = {
  guildId: string;
  actorId: string;
};

export type SetupCommand = CommandBase & {
  type: "setup";
  categoryName: string;
  incubatorName: string;
};

export type EditRenameCommand = CommandBase & {
  type: "edit.rename";
  target: "incubator" | "category";
  name: string;
};

export type EditSelectCommand = CommandBase & {
  type: "edit.select";
  categoryId?: string;
  incubatorChannelId?: string | null;
};

export type EditCleanupCommand = CommandBase & {
  type: "edit.cleanup";
  enabled: boolean;
};

export type DefaultsCommand = CommandBase & {
  type: "defaults";
  name?: string;
  limit?: number;
};

// channelId is the voice channel the caller currently sits in, if any.
export type NameCommand = CommandBase & {
  type: "name";
  channelId: string | null;
  name: string;
};

export type LimitCommand = CommandBase & {
  type: "limit";
  channelId: string | null;
  limit: number;
};

export type LockCommand = CommandBase & {
  type: "lock";
  channelId: string;
};

export type UnlockCommand = CommandBase & {
  type: "unlock";
  channelId: string;
};

export type PermitCommand = CommandBase & {
  type: "permit";
  channelId: string;
  targetUserId: string;
};

export type ClaimCommand = CommandBase & {
  type: "claim";
  channelId: string;
};

export type ListCommand = CommandBase & {
  type: "list";
};

export type AuditLogCommand = CommandBase & {
  type: "auditlog";
  count?: number;
};

export type Command =
  | SetupCommand
  | EditRenameCommand
  | EditSelectCommand
  | EditCleanupCommand
  | DefaultsCommand
  | NameCommand
  | LimitCommand
  | LockCommand
  | UnlockCommand
  | PermitCommand
  | ClaimCommand
  | ListCommand
  | AuditLogCommand;

export type CommandType = Command["type"];

type UnknownRecord = Record<string, unknown>;

const isObject = (value: unknown): value is UnknownRecord => {
  return typeof value === "object" && value !== null;
};

const hasNonEmptyString = (value: unknown): value is string => {
  return typeof value === "string" && value.trim().length > 0;
};

const isOptional = <T>(value: unknown, guard: (candidate: unknown) => candidate is T): boolean => {
  return typeof value === "undefined" || guard(value);
};

const isNumber = (value: unknown): value is number => {
  return typeof value === "number" && Number.isFinite(value);
};

const isNullableId = (value: unknown): value is string | null => {
  return value === null || hasNonEmptyString(value);
};

const hasBase = (value: UnknownRecord): boolean => {
  return hasNonEmptyString(value.guildId) && hasNonEmptyString(value.actorId);
};

export const isSetupCommand = (value: unknown): value is SetupCommand => {
  if (!isObject(value) || value.type !== "setup" || !hasBase(value)) {
    return false;
  }

  return hasNonEmptyString(value.categoryName) && hasNonEmptyString(value.incubatorName);
};

export const isEditRenameCommand = (value: unknown): value is EditRenameCommand => {
  if (!isObject(value) || value.type !== "edit.rename" || !hasBase(value)) {
    return false;
  }

  return (value.target === "incubator" || value.target === "category") && typeof value.name === "string";
};

export const isEditSelectCommand = (value: unknown): value is EditSelectCommand => {
  if (!isObject(value) || value.type !== "edit.select" || !hasBase(value)) {
    return false;
  }

  if (typeof value.categoryId === "undefined" && typeof value.incubatorChannelId === "undefined") {
    return false;
  }

  return isOptional(value.categoryId, hasNonEmptyString) && isOptional(value.incubatorChannelId, isNullableId);
};

export const isEditCleanupCommand = (value: unknown): value is EditCleanupCommand => {
  if (!isObject(value) || value.type !== "edit.cleanup" || !hasBase(value)) {
    return false;
  }

  return typeof value.enabled === "boolean";
};

export const isDefaultsCommand = (value: unknown): value is DefaultsCommand => {
  if (!isObject(value) || value.type !== "defaults" || !hasBase(value)) {
    return false;
  }

  if (typeof value.name === "undefined" && typeof value.limit === "undefined") {
    return false;
  }

  return (typeof value.name === "undefined" || typeof value.name === "string") && isOptional(value.limit, isNumber);
};

export const isNameCommand = (value: unknown): value is NameCommand => {
  if (!isObject(value) || value.type !== "name" || !hasBase(value)) {
    return false;
  }

  return isNullableId(value.channelId) && typeof value.name === "string";
};

export const isLimitCommand = (value: unknown): value is LimitCommand => {
  if (!isObject(value) || value.type !== "limit" || !hasBase(value)) {
    return false;
  }

  return isNullableId(value.channelId) && isNumber(value.limit);
};

const isChannelCommand = <T extends LockCommand | UnlockCommand | ClaimCommand>(
  type: T["type"]
) => {
  return (value: unknown): value is T => {
    if (!isObject(value) || value.type !== type || !hasBase(value)) {
      return false;
    }

    return hasNonEmptyString(value.channelId);
  };
};

export const isLockCommand = isChannelCommand<LockCommand>("lock");
export const isUnlockCommand = isChannelCommand<UnlockCommand>("unlock");
export const isClaimCommand = isChannelCommand<ClaimCommand>("claim");

export const isPermitCommand = (value: unknown): value is PermitCommand => {
  if (!isObject(value) || value.type !== "permit" || !hasBase(value)) {
    return false;
  }

  return hasNonEmptyString(value.channelId) && hasNonEmptyString(value.targetUserId);
};

export const isListCommand = (value: unknown): value is ListCommand => {
  return isObject(value) && value.type === "list" && hasBase(value);
};

export const isAuditLogCommand = (value: unknown): value is AuditLogCommand => {
  if (!isObject(value) || value.type !== "auditlog" || !hasBase(value)) {
    return false;
  }

  return isOptional(value.count, isNumber);
};

const guards: Array<(value: unknown) => boolean> = [
  isSetupCommand,
  isEditRenameCommand,
  isEditSelectCommand,
  isEditCleanupCommand,
  isDefaultsCommand,
  isNameCommand,
  isLimitCommand,
  isLockCommand,
  isUnlockCommand,
  isPermitCommand,
  isClaimCommand,
  isListCommand,
  isAuditLogCommand
];

const isCommand = (value: unknown): value is Command => {
  return guards.some((guard) => guard(value));
};

/**
 * Validate the shape of a command handed over by a router. Value checks
 * (name length, limit range) belong to the coordinator and report
 * `invalid-value` there.
 */
export const parseCommand = (value: unknown): Command | null => {
  return isCommand(value) ? value : null;
};
