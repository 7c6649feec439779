// Platform bounds for voice channel names and user limits, plus the rules for
// resolving a new channel's settings from user and guild defaults.

import type { ChannelDefaults } from "./types.js";

export const MAX_USER_LIMIT = 99;
export const MAX_CHANNEL_NAME_LENGTH = 100;
export const USER_PLACEHOLDER = "{user}";
export const DEFAULT_CHANNEL_NAME_TEMPLATE = `${USER_PLACEHOLDER}'s Channel`;

export const normalizeChannelName = (value: string): string | null => {
  const trimmed = value.trim();

  if (trimmed.length === 0 || trimmed.length > MAX_CHANNEL_NAME_LENGTH) {
    return null;
  }

  return trimmed;
};

export const isValidUserLimit = (value: number): boolean => {
  return Number.isInteger(value) && value >= 0 && value <= MAX_USER_LIMIT;
};

export const renderChannelName = (template: string, displayName: string): string => {
  return template.split(USER_PLACEHOLDER).join(displayName).slice(0, MAX_CHANNEL_NAME_LENGTH);
};

/**
 * Resolve the name and user limit of a freshly provisioned channel.
 * A user's preference wins over the guild default; with neither, the channel
 * gets the default template and no limit.
 */
export const resolveChannelSettings = (
  displayName: string,
  preference: ChannelDefaults | null,
  guildDefaults: ChannelDefaults | null
): { name: string; limit: number } => {
  const template = preference?.name ?? guildDefaults?.name ?? DEFAULT_CHANNEL_NAME_TEMPLATE;
  const limit = preference?.limit ?? guildDefaults?.limit ?? 0;

  return { name: renderChannelName(template, displayName), limit };
};
