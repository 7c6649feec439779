import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { TemporaryChannel } from "../../../shared/src/types.js";
import type { CoordinatorStore, NewAuditEntry } from "../../src/store.js";

export const makeChannel = (channelId: string, overrides: Partial<TemporaryChannel> = {}): TemporaryChannel => ({
  channelId,
  guildId: "g1",
  ownerId: "u1",
  locked: false,
  permittedUserIds: [],
  createdAt: "2026-01-01T00:00:00.000Z",
  ...overrides
});

export const makeAudit = (overrides: Partial<NewAuditEntry> = {}): NewAuditEntry => ({
  guildId: "g1",
  actorId: "u1",
  action: "channel-created",
  channelId: "c1",
  outcome: "success",
  details: null,
  timestamp: "2026-01-01T00:00:00.000Z",
  ...overrides
});

/** Behaviour every CoordinatorStore implementation shares. */
export const describeStoreContract = (
  name: string,
  open: () => CoordinatorStore,
  cleanup: () => void = () => undefined
): void => {
  describe(`${name} contract`, () => {
    let store: CoordinatorStore;

    beforeEach(() => {
      store = open();
    });

    afterEach(() => {
      store.close();
      cleanup();
    });

    describe("guild configuration", () => {
      it("returns null for an unknown guild", async () => {
        expect(await store.getGuildConfig("g1")).toBeNull();
      });

      it("saves and overwrites a guild config", async () => {
        await store.commit([
          {
            type: "save-guild-config",
            config: { guildId: "g1", ownerId: "admin", categoryId: "cat", incubatorChannelId: "inc", cleanupOnStartup: true }
          }
        ]);
        await store.commit([
          {
            type: "save-guild-config",
            config: { guildId: "g1", ownerId: "admin", categoryId: "cat", incubatorChannelId: null, cleanupOnStartup: false }
          }
        ]);

        expect(await store.getGuildConfig("g1")).toEqual({
          guildId: "g1",
          ownerId: "admin",
          categoryId: "cat",
          incubatorChannelId: null,
          cleanupOnStartup: false
        });
      });
    });

    describe("defaults and preferences", () => {
      it("merges patches field by field", async () => {
        await store.commit([{ type: "save-user-preference", guildId: "g1", userId: "u1", patch: { name: "Den" } }]);
        await store.commit([{ type: "save-user-preference", guildId: "g1", userId: "u1", patch: { limit: 4 } }]);

        expect(await store.getUserPreference("g1", "u1")).toEqual({ name: "Den", limit: 4 });
        expect(await store.getUserPreference("g2", "u1")).toBeNull();
      });

      it("keeps guild defaults separate from user preferences", async () => {
        await store.commit([{ type: "save-guild-defaults", guildId: "g1", patch: { name: "{user} room", limit: 2 } }]);

        expect(await store.getGuildDefaults("g1")).toEqual({ name: "{user} room", limit: 2 });
        expect(await store.getUserPreference("g1", "u1")).toBeNull();
      });
    });

    describe("channel registry", () => {
      it("inserts, reads and deletes a channel", async () => {
        await store.commit([{ type: "insert-channel", channel: makeChannel("c1", { permittedUserIds: ["u2", "u3"] }) }]);

        expect(await store.getChannel("c1")).toEqual(makeChannel("c1", { permittedUserIds: ["u2", "u3"] }));

        await store.commit([{ type: "delete-channel", channelId: "c1" }]);
        expect(await store.getChannel("c1")).toBeNull();
      });

      it("applies partial updates", async () => {
        await store.commit([{ type: "insert-channel", channel: makeChannel("c1") }]);
        await store.commit([
          { type: "update-channel", channelId: "c1", patch: { ownerId: "u9", locked: true, permittedUserIds: ["u4"] } }
        ]);

        expect(await store.getChannel("c1")).toEqual(
          makeChannel("c1", { ownerId: "u9", locked: true, permittedUserIds: ["u4"] })
        );
      });

      it("finds channels by owner within a guild", async () => {
        await store.commit([
          { type: "insert-channel", channel: makeChannel("c1") },
          { type: "insert-channel", channel: makeChannel("c2", { ownerId: "u2" }) },
          { type: "insert-channel", channel: makeChannel("c3", { guildId: "g2" }) }
        ]);

        const owned = await store.findChannelsByOwner("g1", "u1");
        expect(owned.map((channel) => channel.channelId)).toEqual(["c1"]);
      });

      it("lists channels for one guild or all guilds", async () => {
        await store.commit([
          { type: "insert-channel", channel: makeChannel("c1") },
          { type: "insert-channel", channel: makeChannel("c2", { guildId: "g2" }) }
        ]);

        expect((await store.listChannels("g1")).map((channel) => channel.channelId)).toEqual(["c1"]);
        expect((await store.listChannels()).map((channel) => channel.channelId).sort()).toEqual(["c1", "c2"]);
      });

      it("returns copies that callers cannot mutate", async () => {
        await store.commit([{ type: "insert-channel", channel: makeChannel("c1") }]);

        const first = await store.getChannel("c1");
        first?.permittedUserIds.push("intruder");

        expect((await store.getChannel("c1"))?.permittedUserIds).toEqual([]);
      });
    });

    describe("atomic commit", () => {
      it("rejects a duplicate insert and leaves earlier writes of the unit unapplied", async () => {
        await store.commit([{ type: "insert-channel", channel: makeChannel("c1") }]);

        await expect(
          store.commit([
            { type: "append-audit", entry: makeAudit() },
            { type: "insert-channel", channel: makeChannel("c1", { ownerId: "u2" }) }
          ])
        ).rejects.toThrow();

        expect((await store.getChannel("c1"))?.ownerId).toBe("u1");
        expect(await store.latestAuditEntries("g1", 10)).toEqual([]);
      });
    });

    describe("audit log", () => {
      it("returns the newest entries first, limited to count", async () => {
        await store.commit([
          { type: "append-audit", entry: makeAudit({ action: "channel-created" }) },
          { type: "append-audit", entry: makeAudit({ action: "channel-locked" }) },
          { type: "append-audit", entry: makeAudit({ action: "channel-deleted" }) },
          { type: "append-audit", entry: makeAudit({ guildId: "g2", action: "setup" }) }
        ]);

        const entries = await store.latestAuditEntries("g1", 2);
        expect(entries.map((entry) => entry.action)).toEqual(["channel-deleted", "channel-locked"]);
        expect(entries[0].id).toBeGreaterThan(entries[1].id);
      });

      it("keeps every field of an entry", async () => {
        await store.commit([
          {
            type: "append-audit",
            entry: makeAudit({ actorId: null, channelId: null, outcome: "failure", details: "boom" })
          }
        ]);

        const [entry] = await store.latestAuditEntries("g1", 1);
        expect(entry).toEqual({
          id: entry.id,
          timestamp: "2026-01-01T00:00:00.000Z",
          guildId: "g1",
          actorId: null,
          action: "channel-created",
          channelId: null,
          outcome: "failure",
          details: "boom"
        });
      });
    });
  });
};
