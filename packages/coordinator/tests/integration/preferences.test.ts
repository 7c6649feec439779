import { describe, it, expect } from "vitest";
import { ADMIN_ID, createHarness, createdChannelId, GUILD_ID } from "./helpers.js";

describe("names, limits and defaults", () => {
  describe("setName", () => {
    it("renames the owner's live channel and stores the preference", async () => {
      const h = await createHarness();
      const channelId = createdChannelId(await h.arrive("u1"));

      const outcome = await h.coordinator.setName(GUILD_ID, "u1", channelId, "  Den  ");

      expect(outcome).toEqual({
        ok: true,
        value: { kind: "preference", mode: "live", channelId, preference: { name: "Den" } }
      });
      expect(h.gateway.channel(channelId).name).toBe("Den");
      expect(await h.store.getUserPreference(GUILD_ID, "u1")).toEqual({ name: "Den", limit: null });
      const actions = (await h.store.latestAuditEntries(GUILD_ID, 2)).map((entry) => entry.action);
      expect(actions).toEqual(["default-name-set", "channel-renamed"]);
    });

    it("uses the stored name for the member's next channel", async () => {
      const h = await createHarness();
      await h.coordinator.setName(GUILD_ID, "u1", null, "{user} hangout");

      const channelId = createdChannelId(await h.arrive("u1", "Ada"));

      expect(h.gateway.channel(channelId).name).toBe("Ada hangout");
    });

    it("only stores the preference when the caller does not own the channel", async () => {
      const h = await createHarness();
      const channelId = createdChannelId(await h.arrive("u1"));

      const outcome = await h.coordinator.setName(GUILD_ID, "u2", channelId, "Mine now");

      expect(outcome).toEqual({
        ok: true,
        value: { kind: "preference", mode: "preference-only", channelId: null, preference: { name: "Mine now" } }
      });
      expect(h.gateway.channel(channelId).name).toBe("u1's Channel");
      expect(h.gateway.callsTo("renameChannel")).toEqual([]);
    });

    it("rejects empty and overlong names without storing anything", async () => {
      const h = await createHarness();

      expect(await h.coordinator.setName(GUILD_ID, "u1", null, "   ")).toMatchObject({ ok: false, reason: "invalid-value" });
      expect(await h.coordinator.setName(GUILD_ID, "u1", null, "x".repeat(101))).toMatchObject({
        ok: false,
        reason: "invalid-value"
      });
      expect(await h.store.getUserPreference(GUILD_ID, "u1")).toBeNull();
    });
  });

  describe("setLimit", () => {
    it("applies the limit to the live channel", async () => {
      const h = await createHarness();
      const channelId = createdChannelId(await h.arrive("u1"));

      const outcome = await h.coordinator.setLimit(GUILD_ID, "u1", channelId, 5);

      expect(outcome).toMatchObject({ ok: true, value: { mode: "live", preference: { limit: 5 } } });
      expect(h.gateway.channel(channelId).limit).toBe(5);
      expect(await h.store.getUserPreference(GUILD_ID, "u1")).toEqual({ name: null, limit: 5 });
    });

    it("accepts 0 and 99 and rejects values outside that range", async () => {
      const h = await createHarness();

      expect(await h.coordinator.setLimit(GUILD_ID, "u1", null, 0)).toMatchObject({ ok: true });
      expect(await h.coordinator.setLimit(GUILD_ID, "u1", null, 99)).toMatchObject({ ok: true });
      expect(await h.coordinator.setLimit(GUILD_ID, "u1", null, 100)).toMatchObject({ ok: false, reason: "invalid-value" });
      expect(await h.coordinator.setLimit(GUILD_ID, "u1", null, -1)).toMatchObject({ ok: false, reason: "invalid-value" });
      expect(await h.coordinator.setLimit(GUILD_ID, "u1", null, 2.5)).toMatchObject({ ok: false, reason: "invalid-value" });
      expect(await h.store.getUserPreference(GUILD_ID, "u1")).toEqual({ name: null, limit: 99 });
    });

    it("leaves a live channel untouched for out-of-range limits", async () => {
      const h = await createHarness();
      const channelId = createdChannelId(await h.arrive("u1"));

      expect(await h.coordinator.setLimit(GUILD_ID, "u1", channelId, -1)).toMatchObject({ ok: false, reason: "invalid-value" });
      expect(await h.coordinator.setLimit(GUILD_ID, "u1", channelId, 100)).toMatchObject({ ok: false, reason: "invalid-value" });
      expect(h.gateway.channel(channelId).limit).toBe(0);
      expect(h.gateway.callsTo("setLimit")).toEqual([]);
      expect(await h.store.getUserPreference(GUILD_ID, "u1")).toBeNull();
    });

    it("keeps the old preference when the platform call fails", async () => {
      const h = await createHarness();
      const channelId = createdChannelId(await h.arrive("u1"));
      h.gateway.failNext("setLimit");

      const outcome = await h.coordinator.setLimit(GUILD_ID, "u1", channelId, 5);

      expect(outcome).toMatchObject({ ok: false, reason: "platform-unavailable" });
      expect(await h.store.getUserPreference(GUILD_ID, "u1")).toBeNull();
      expect(h.gateway.channel(channelId).limit).toBe(0);
    });
  });

  describe("guild defaults", () => {
    it("names new channels from the guild defaults", async () => {
      const h = await createHarness();
      const outcome = await h.coordinator.setDefaults(GUILD_ID, ADMIN_ID, { name: "{user}'s Room", limit: 3 });
      expect(outcome).toEqual({ ok: true, value: { kind: "defaults", defaults: { name: "{user}'s Room", limit: 3 } } });

      const channelId = createdChannelId(await h.arrive("u5", "Eve"));

      expect(h.gateway.channel(channelId)).toMatchObject({ name: "Eve's Room", limit: 3 });
    });

    it("lets a member preference override one field of the guild defaults", async () => {
      const h = await createHarness();
      await h.coordinator.setDefaults(GUILD_ID, ADMIN_ID, { name: "{user}'s Room", limit: 3 });
      await h.coordinator.setLimit(GUILD_ID, "u1", null, 7);

      const channelId = createdChannelId(await h.arrive("u1", "Ada"));

      expect(h.gateway.channel(channelId)).toMatchObject({ name: "Ada's Room", limit: 7 });
    });

    it("rejects invalid default values", async () => {
      const h = await createHarness();

      expect(await h.coordinator.setDefaults(GUILD_ID, ADMIN_ID, { limit: 120 })).toMatchObject({
        ok: false,
        reason: "invalid-value"
      });
      expect(await h.coordinator.setDefaults(GUILD_ID, ADMIN_ID, { name: "" })).toMatchObject({
        ok: false,
        reason: "invalid-value"
      });
      expect(await h.store.getGuildDefaults(GUILD_ID)).toBeNull();
    });
  });
});
