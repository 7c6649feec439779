// Entry point: wires the store, the Discord gateway and the lifecycle coordinator.

import pino from "pino";

import { loadConfig } from "./config.js";
import { LifecycleCoordinator } from "./coordinator.js";
import { DiscordGateway } from "./discord-gateway.js";
import { describeError } from "./errors.js";
import { createHealthServer } from "./health-server.js";
import { MemoryStore } from "./memory-store.js";
import { SqliteStore } from "./sqlite-store.js";
import type { CoordinatorStore } from "./store.js";

const config = loadConfig();

// ── Pino logger ──
const logger = pino({ level: config.logLevel });

const store: CoordinatorStore = config.store === "sqlite" ? new SqliteStore(config.dbPath) : new MemoryStore();
const gateway = new DiscordGateway(logger);
const coordinator = new LifecycleCoordinator({
  store,
  gateway,
  logger,
  lockTimeoutMs: config.lockTimeoutMs,
  createDebounceMs: config.createDebounceMs,
  auditLogMaxCount: config.auditLogMaxCount
});

const logCrash = (source: string) => (error: unknown): void => {
  logger.error({ event: "event.crashed", source, message: describeError(error) });
};

const unsubscribers = [
  gateway.onMemberMoved((event) => {
    coordinator.handleMemberMoved(event).catch(logCrash("voice-state-update"));
  }),
  gateway.onChannelDeleted((event) => {
    coordinator.handleChannelDeleted(event).catch(logCrash("channel-delete"));
  })
];

const startedAt = Date.now();
const httpServer = createHealthServer({
  startedAt,
  trackedChannelCount: async () => (await store.listChannels()).length,
  activeSectionCount: () => coordinator.activeSectionCount()
});

// ── Periodic sweep of empty channels whose departure event was missed ──
let sweepInterval: NodeJS.Timeout | null = null;
if (config.sweepIntervalMs > 0) {
  sweepInterval = setInterval(() => {
    coordinator
      .sweep()
      .then((outcome) => {
        if (outcome.ok && (outcome.value.deleted.length > 0 || outcome.value.failed.length > 0)) {
          logger.info({ event: "sweep.finished", ...outcome.value });
        }
      })
      .catch(logCrash("sweep"));
  }, config.sweepIntervalMs);
}

// ── Graceful shutdown ──
let isShuttingDown = false;

const gracefulShutdown = async (): Promise<void> => {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info({ event: "server.shutting-down" });

  if (sweepInterval) {
    clearInterval(sweepInterval);
  }
  for (const unsubscribe of unsubscribers) {
    unsubscribe();
  }

  await new Promise<void>((resolve) => httpServer.close(() => resolve()));

  try {
    await gateway.stop();
  } catch (error) {
    logger.warn({ event: "discord.stop-failed", message: describeError(error) });
  }

  store.close();

  logger.info({ event: "server.stopped" });
  process.exit(0);
};

const onSignal = (): void => {
  gracefulShutdown().catch((error: unknown) => {
    logger.error({ event: "server.shutdown-failed", message: describeError(error) });
    process.exit(1);
  });
};

process.on("SIGTERM", onSignal);
process.on("SIGINT", onSignal);

httpServer.listen(config.port, "0.0.0.0", () => {
  logger.info({ event: "server.started", port: config.port, store: config.store, logLevel: config.logLevel });
});

await gateway.start(config.discordToken);

const reconciled = await coordinator.reconcile();
if (!reconciled.ok) {
  logger.error({ event: "reconcile.failed", reason: reconciled.reason, message: reconciled.message });
}
