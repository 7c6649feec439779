// Environment configuration for the coordinator process.

import { z } from "zod";
import {
  DEFAULT_AUDIT_LOG_MAX,
  DEFAULT_CREATE_DEBOUNCE_MS,
  DEFAULT_LOCK_TIMEOUT_MS
} from "./coordinator.js";

const DEFAULT_PORT = 3001;
const DEFAULT_SWEEP_INTERVAL_MS = 300_000;

const configSchema = z.object({
  discordToken: z.string().min(1, "DISCORD_TOKEN is required"),
  store: z.enum(["memory", "sqlite"]).default("sqlite"),
  dbPath: z.string().min(1).default("./data/tempvoice.db"),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
  lockTimeoutMs: z.number().int().min(100).max(120_000).default(DEFAULT_LOCK_TIMEOUT_MS),
  createDebounceMs: z.number().int().min(0).max(60_000).default(DEFAULT_CREATE_DEBOUNCE_MS),
  // 0 disables the periodic empty-channel sweep.
  sweepIntervalMs: z.number().int().min(0).default(DEFAULT_SWEEP_INTERVAL_MS),
  auditLogMaxCount: z.number().int().min(1).max(500).default(DEFAULT_AUDIT_LOG_MAX)
});

export type Config = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

const readInt = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }

  return Number(value);
};

const readString = (value: string | undefined): string | undefined => {
  return value === undefined || value.trim() === "" ? undefined : value;
};

/**
 * Parse environment variables into configuration. Throws with every
 * validation issue listed when the environment is invalid.
 */
export function loadConfig(env: Env = process.env): Config {
  const raw = {
    discordToken: env["DISCORD_TOKEN"] ?? "",
    store: readString(env["TEMPVOICE_STORE"]),
    dbPath: readString(env["TEMPVOICE_DB_PATH"]),
    logLevel: readString(env["LOG_LEVEL"]),
    port: readInt(env["PORT"]),
    lockTimeoutMs: readInt(env["TEMPVOICE_LOCK_TIMEOUT_MS"]),
    createDebounceMs: readInt(env["TEMPVOICE_CREATE_DEBOUNCE_MS"]),
    sweepIntervalMs: readInt(env["TEMPVOICE_SWEEP_INTERVAL_MS"]),
    auditLogMaxCount: readInt(env["TEMPVOICE_AUDIT_MAX"])
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join("\n")}`);
  }

  return result.data;
}
