/**
 * Unit Tests: Temp Channel Lifecycle Engine
 *
 * Purpose: Verify provisioning, the tick pass (expiry, inactivity, warnings,
 * countdown renames), closure, membership and external deletion against an
 * in-process platform.
 */

import { describe, expect, it } from "vitest";
import type { DeleteOutcome } from "@/modules/temp-channels/platform";
import type { TempChannelError } from "@/modules/temp-channels/errors";
import { ErrResult, OkResult } from "@/utils/result";
import { permanentFailure, transientFailure } from "./_utils/fakePlatform";
import {
	ADMIN,
	createHarness,
	durationOf,
	HOUR,
	MIN,
	OWNER,
	STRANGER,
} from "./_utils/harness";

const failDelete = (error: TempChannelError) => ErrResult<DeleteOutcome, TempChannelError>(error);

describe("LifecycleEngine.provision", () => {
	it("creates the channel and tracks an active descriptor", async () => {
		const h = createHarness();
		const descriptor = await h.provision();

		expect(descriptor.id).toBe("chan-1");
		expect(descriptor.state).toBe("active");
		expect(descriptor.slug).toBe("study-group");
		expect(descriptor.expiresAt).toBe(30 * MIN);
		expect(descriptor.inactivityDeadline).toBe(30 * MIN);
		expect(descriptor.lastActivityAt).toBeNull();

		const [created] = h.platform.created;
		expect(created.name).toBe("⏰・study-group-30m");
		expect(created.parentId).toBe("category-1");
		expect(created.topic).toBe("⏰ Expires in 30min | Created by Owner");
		expect(created.grants[0]).toEqual({
			targetId: "guild-1",
			targetType: "role",
			allow: ["ViewChannel"],
			deny: [],
		});

		expect(h.rateLimiter.snapshot(OWNER.userId)).toEqual({
			activeCount: 1,
			pending: 0,
			lastCreationAt: 0,
		});
	});

	it("caps the first expiry at the maximum lifetime", async () => {
		const h = createHarness({ maxLifetimeMs: HOUR });
		const descriptor = await h.provision({ duration: durationOf("24h") });

		expect(descriptor.expiresAt).toBe(HOUR);
		expect(descriptor.inactivityDeadline).toBe(HOUR);
		expect(h.platform.created[0].name).toBe("⏰・study-group-1h");
	});

	it("posts a welcome message in the new channel", async () => {
		const h = createHarness();
		await h.provision();
		await h.engine.whenIdle();

		expect(h.platform.messages).toHaveLength(1);
		expect(h.platform.messages[0].channelId).toBe("chan-1");
		expect(h.platform.messages[0].message.content?.split("\n")[0]).toBe(
			"**Study Group** - Created by <@owner-1>",
		);
	});

	it("denies private channels to everyone but the owner and the bot", async () => {
		const h = createHarness();
		await h.provision({ visibility: "private" });

		const grants = h.platform.created[0].grants;
		expect(grants.map((grant) => grant.targetId)).toEqual(["guild-1", "owner-1", "bot-1"]);
		expect(grants[0].deny).toEqual(["ViewChannel"]);
	});

	it("rejects a topic with nothing usable before reserving a slot", async () => {
		const h = createHarness();
		const result = await h.engine.provision({
			guildId: "guild-1",
			ownerId: OWNER.userId,
			ownerName: "Owner",
			topic: "!!!",
			visibility: "public",
			duration: durationOf("30min"),
		});

		expect(result.isErr() && result.error.code).toBe("INVALID_TOPIC");
		expect(h.rateLimiter.snapshot(OWNER.userId).pending).toBe(0);
		expect(h.platform.created).toHaveLength(0);
	});

	it("stops at the per-user channel limit", async () => {
		const h = createHarness();
		await h.provision();
		await h.provision();

		const third = await h.engine.provision({
			guildId: "guild-1",
			ownerId: OWNER.userId,
			ownerName: "Owner",
			topic: "Third",
			visibility: "public",
			duration: durationOf("30min"),
		});

		expect(third.isErr()).toBe(true);
		if (third.isErr()) {
			expect(third.error.code).toBe("MAX_CHANNELS_REACHED");
			expect(third.error.details.limit).toBe(2);
		}
		expect(h.platform.created).toHaveLength(2);
		expect(h.store.size).toBe(2);
	});

	it("lets only one of two concurrent requests take the last slot", async () => {
		const h = createHarness({ maxChannelsPerUser: 1 });
		const request = {
			guildId: "guild-1",
			ownerId: OWNER.userId,
			ownerName: "Owner",
			topic: "Race",
			visibility: "public" as const,
			duration: durationOf("30min"),
		};

		const results = await Promise.all([h.engine.provision(request), h.engine.provision(request)]);

		expect(results.filter((result) => result.isOk())).toHaveLength(1);
		expect(
			results.some((result) => result.isErr() && result.error.code === "MAX_CHANNELS_REACHED"),
		).toBe(true);
		expect(h.platform.created).toHaveLength(1);
	});

	it("holds the cooldown while another creation from the same user is in flight", async () => {
		const h = createHarness({ creationCooldownMs: 5 * MIN });
		const request = {
			guildId: "guild-1",
			ownerId: OWNER.userId,
			ownerName: "Owner",
			topic: "Race",
			visibility: "public" as const,
			duration: durationOf("30min"),
		};

		const results = await Promise.all([h.engine.provision(request), h.engine.provision(request)]);

		expect(results.filter((result) => result.isOk())).toHaveLength(1);
		expect(
			results.some((result) => result.isErr() && result.error.code === "COOLDOWN_ACTIVE"),
		).toBe(true);
		expect(h.platform.created).toHaveLength(1);
		expect(h.rateLimiter.snapshot(OWNER.userId)).toEqual({
			activeCount: 1,
			pending: 0,
			lastCreationAt: 0,
		});
	});

	it("enforces the creation cooldown", async () => {
		const h = createHarness({ creationCooldownMs: 5 * MIN });
		await h.provision();

		h.clock.now = 2 * MIN;
		const early = await h.engine.provision({
			guildId: "guild-1",
			ownerId: OWNER.userId,
			ownerName: "Owner",
			topic: "Again",
			visibility: "public",
			duration: durationOf("30min"),
		});
		expect(early.isErr()).toBe(true);
		if (early.isErr()) {
			expect(early.error.code).toBe("COOLDOWN_ACTIVE");
			expect(early.error.details.retryAfterMs).toBe(3 * MIN);
		}

		h.clock.now = 5 * MIN;
		const later = await h.provision({ topic: "Again" });
		expect(later.id).toBe("chan-2");
	});

	it("releases the reservation when the platform refuses the channel", async () => {
		const h = createHarness();
		h.platform.createFailure = transientFailure();

		const result = await h.engine.provision({
			guildId: "guild-1",
			ownerId: OWNER.userId,
			ownerName: "Owner",
			topic: "Study Group",
			visibility: "public",
			duration: durationOf("30min"),
		});

		expect(result.isErr()).toBe(true);
		if (result.isErr()) {
			expect(result.error.code).toBe("PLATFORM_FAILURE");
			expect(result.error.transient).toBe(true);
		}
		expect(h.rateLimiter.snapshot(OWNER.userId)).toEqual({
			activeCount: 0,
			pending: 0,
			lastCreationAt: null,
		});
		expect(h.store.size).toBe(0);
	});
});

describe("LifecycleEngine.tick", () => {
	it("deletes a channel that reached its expiry", async () => {
		const h = createHarness();
		await h.provision();

		const early = await h.engine.tick(30 * MIN - 1);
		expect(early.deleted).toEqual([]);

		const report = await h.engine.tick(30 * MIN);
		expect(report.deleted).toEqual([{ channelId: "chan-1", reason: "expired" }]);

		await h.engine.whenIdle();
		expect(h.platform.deleteCalls).toEqual([
			{ channelId: "chan-1", reason: "temp-channel:expired" },
		]);
		expect(h.platform.messages.at(-1)?.message.content).toBe("⏰ Time's up!");
		expect(h.sleeps).toEqual([2_000]);
		expect(h.store.size).toBe(0);
		expect(h.rateLimiter.snapshot(OWNER.userId).activeCount).toBe(0);
	});

	it("deletes an idle channel once the grace period after its last message runs out", async () => {
		const h = createHarness();
		await h.provision({ duration: durationOf("2h") });

		expect(await h.engine.recordActivity("chan-1", 10 * MIN)).toBe(true);
		expect(h.engine.get("chan-1")?.inactivityDeadline).toBe(25 * MIN);

		const warned = await h.engine.tick(24 * MIN);
		expect(warned.warned).toEqual([{ channelId: "chan-1", kind: "inactivity" }]);

		const report = await h.engine.tick(25 * MIN);
		expect(report.deleted).toEqual([{ channelId: "chan-1", reason: "inactive" }]);

		await h.engine.whenIdle();
		expect(h.platform.deleteCalls[0].reason).toBe("temp-channel:inactive");
	});

	it("shortens the grace period to half of a short channel's lifetime", async () => {
		const h = createHarness();
		await h.provision({ duration: durationOf("10min") });
		await h.engine.whenIdle();
		expect(h.platform.messages[0].message.content?.split("\n")[1]).toBe(
			"⏰ This channel will be deleted in **10min** or after **5m** without messages.",
		);

		await h.engine.recordActivity("chan-1", 0);
		expect(h.engine.get("chan-1")?.inactivityDeadline).toBe(5 * MIN);

		const report = await h.engine.tick(5 * MIN);
		expect(report.deleted).toEqual([{ channelId: "chan-1", reason: "inactive" }]);
	});

	it("reports expiry when both deadlines fall on the same instant", async () => {
		const h = createHarness();
		await h.provision();
		await h.engine.recordActivity("chan-1", 15 * MIN);

		const report = await h.engine.tick(30 * MIN);
		expect(report.deleted).toEqual([{ channelId: "chan-1", reason: "expired" }]);
	});

	it("warns once per deadline and adds the extension shortcuts to expiry warnings", async () => {
		const h = createHarness();
		await h.provision();

		const first = await h.engine.tick(25 * MIN);
		expect(first.warned).toEqual([{ channelId: "chan-1", kind: "expiry" }]);

		const second = await h.engine.tick(26 * MIN);
		expect(second.warned).toEqual([]);

		await h.engine.whenIdle();
		expect(h.engine.get("chan-1")?.warningMessageId).toBe("msg-2");
		expect(h.platform.messages[1].message.embed?.description).toBe(
			"This channel will be deleted in **5 minutes**!",
		);
		expect(h.platform.reactions).toEqual([
			{ channelId: "chan-1", messageId: "msg-2", emojis: ["\u{1F550}", "\u{1F559}", "\u{1F55E}"] },
		]);
	});

	it("warns again after activity pushed the inactivity deadline back", async () => {
		const h = createHarness();
		await h.provision({ duration: durationOf("2h") });
		await h.engine.recordActivity("chan-1", 0);

		const first = await h.engine.tick(10 * MIN);
		expect(first.warned).toEqual([{ channelId: "chan-1", kind: "inactivity" }]);

		await h.engine.recordActivity("chan-1", 12 * MIN);
		const quiet = await h.engine.tick(13 * MIN);
		expect(quiet.warned).toEqual([]);

		const again = await h.engine.tick(22 * MIN);
		expect(again.warned).toEqual([{ channelId: "chan-1", kind: "inactivity" }]);
	});

	it("refreshes the countdown in the channel name", async () => {
		const h = createHarness();
		await h.provision({ duration: durationOf("2h") });

		const report = await h.engine.tick(5 * MIN);
		expect(report.renamed).toEqual(["chan-1"]);

		const tooSoon = await h.engine.tick(7 * MIN);
		expect(tooSoon.renamed).toEqual([]);

		await h.engine.whenIdle();
		expect(h.platform.renames).toEqual([{ channelId: "chan-1", name: "⏰・study-group-1h55m" }]);
	});

	it("skips channels that are already being deleted", async () => {
		const h = createHarness();
		await h.provision();
		const release = h.platform.holdDeletes();
		await h.engine.close("chan-1", OWNER);

		const report = await h.engine.tick(30 * MIN);
		expect(report.checked).toBe(0);
		expect(report.deleted).toEqual([]);

		release();
		await h.engine.whenIdle();
		expect(h.platform.deleteCalls).toHaveLength(1);
	});
});

describe("LifecycleEngine deletion retries", () => {
	it("retries transient failures with exponential backoff", async () => {
		const h = createHarness();
		await h.provision();
		h.platform.deleteResults.push(failDelete(transientFailure()), failDelete(transientFailure()));

		await h.engine.close("chan-1", OWNER);
		await h.engine.whenIdle();

		expect(h.platform.deleteCalls).toHaveLength(3);
		expect(h.sleeps).toEqual([2_000, 1_000, 2_000]);
		expect(h.store.size).toBe(0);
		expect(h.logger.error).not.toHaveBeenCalled();
	});

	it("drops local state after the last attempt fails", async () => {
		const h = createHarness();
		await h.provision();
		h.platform.deleteResults.push(
			failDelete(transientFailure()),
			failDelete(transientFailure()),
			failDelete(transientFailure()),
		);

		await h.engine.close("chan-1", OWNER);
		await h.engine.whenIdle();

		expect(h.platform.deleteCalls).toHaveLength(3);
		expect(h.store.size).toBe(0);
		expect(h.logger.error).toHaveBeenCalledTimes(1);
	});

	it("does not retry a permanent failure", async () => {
		const h = createHarness();
		await h.provision();
		h.platform.deleteResults.push(failDelete(permanentFailure()));

		await h.engine.close("chan-1", OWNER);
		await h.engine.whenIdle();

		expect(h.platform.deleteCalls).toHaveLength(1);
		expect(h.sleeps).toEqual([2_000]);
		expect(h.store.size).toBe(0);
	});

	it("treats a channel that is already gone as deleted", async () => {
		const h = createHarness();
		await h.provision();
		h.platform.deleteResults.push(OkResult<DeleteOutcome, TempChannelError>("not_found"));

		await h.engine.close("chan-1", OWNER);
		await h.engine.whenIdle();

		expect(h.platform.deleteCalls).toHaveLength(1);
		expect(h.store.size).toBe(0);
		expect(h.logger.error).not.toHaveBeenCalled();
	});
});

describe("LifecycleEngine.extend", () => {
	it("moves the expiry and queues a rename", async () => {
		const h = createHarness();
		await h.provision();

		const result = await h.engine.extend("chan-1", OWNER, 10 * MIN);
		expect(result.isOk() && result.value).toEqual({
			channelId: "chan-1",
			previousExpiresAt: 30 * MIN,
			expiresAt: 40 * MIN,
			requestedMs: 10 * MIN,
			appliedMs: 10 * MIN,
			capped: false,
		});

		await h.engine.whenIdle();
		expect(h.engine.get("chan-1")?.extensions).toBe(1);
		expect(h.platform.renames).toEqual([{ channelId: "chan-1", name: "⏰・study-group-40m" }]);
	});

	it("marks the channel topic as extended", async () => {
		const h = createHarness({ maxLifetimeMs: HOUR });
		await h.provision({ duration: durationOf("45min") });

		await h.engine.extend("chan-1", OWNER, 30 * MIN);
		await h.engine.extend("chan-1", OWNER, 5 * MIN);
		await h.engine.whenIdle();

		expect(h.platform.topics).toEqual([
			{ channelId: "chan-1", topic: "⏰ Extended! | Created by Owner" },
		]);
	});

	it("never goes past the maximum lifetime", async () => {
		const h = createHarness({ maxLifetimeMs: HOUR });
		await h.provision({ duration: durationOf("45min") });

		const first = await h.engine.extend("chan-1", OWNER, 30 * MIN);
		expect(first.isOk()).toBe(true);
		if (first.isOk()) {
			expect(first.value.expiresAt).toBe(HOUR);
			expect(first.value.appliedMs).toBe(15 * MIN);
			expect(first.value.capped).toBe(true);
		}

		const second = await h.engine.extend("chan-1", OWNER, 5 * MIN);
		expect(second.isOk()).toBe(true);
		if (second.isOk()) {
			expect(second.value.expiresAt).toBe(HOUR);
			expect(second.value.appliedMs).toBe(0);
		}
		expect(h.engine.get("chan-1")?.extensions).toBe(1);
	});

	it("keeps the inactivity deadline inside the new expiry", async () => {
		const h = createHarness();
		await h.provision();
		await h.engine.recordActivity("chan-1", 20 * MIN);
		expect(h.engine.get("chan-1")?.inactivityDeadline).toBe(30 * MIN);

		await h.engine.extend("chan-1", OWNER, 30 * MIN);
		expect(h.engine.get("chan-1")?.inactivityDeadline).toBe(35 * MIN);
	});

	it("rejects amounts that are not positive", async () => {
		const h = createHarness();
		await h.provision();

		const result = await h.engine.extend("chan-1", OWNER, 0);
		expect(result.isErr() && result.error.code).toBe("INVALID_AMOUNT");
	});

	it("only lets the owner or an admin extend", async () => {
		const h = createHarness();
		await h.provision();

		const stranger = await h.engine.extend("chan-1", STRANGER, 5 * MIN);
		expect(stranger.isErr() && stranger.error.code).toBe("NOT_AUTHORIZED");

		const admin = await h.engine.extend("chan-1", ADMIN, 5 * MIN);
		expect(admin.isOk()).toBe(true);
	});

	it("reports unknown channels", async () => {
		const h = createHarness();
		const result = await h.engine.extend("chan-404", OWNER, 5 * MIN);
		expect(result.isErr() && result.error.code).toBe("NOT_FOUND");
	});

	it("refuses channels that are being deleted and leaves them untouched", async () => {
		const h = createHarness();
		await h.provision();
		const release = h.platform.holdDeletes();
		await h.engine.close("chan-1", OWNER);

		const result = await h.engine.extend("chan-1", OWNER, 10 * MIN);
		expect(result.isErr() && result.error.code).toBe("CHANNEL_CLOSING");
		expect(h.engine.get("chan-1")?.expiresAt).toBe(30 * MIN);

		release();
		await h.engine.whenIdle();
		expect(h.engine.get("chan-1")).toBeNull();
	});
});

describe("LifecycleEngine close", () => {
	it("frees the owner's slot as soon as the channel starts closing", async () => {
		const h = createHarness();
		await h.provision();
		await h.provision({ topic: "Second" });
		const release = h.platform.holdDeletes();

		const closed = await h.engine.close("chan-1", OWNER);
		expect(closed.isOk() && closed.value).toEqual({ channelId: "chan-1", reason: "closed" });
		expect(h.engine.get("chan-1")?.state).toBe("pending_deletion");
		expect(h.rateLimiter.snapshot(OWNER.userId).activeCount).toBe(1);

		const third = await h.provision({ topic: "Third" });
		expect(third.id).toBe("chan-3");

		release();
		await h.engine.whenIdle();
		expect(h.platform.deleteCalls).toEqual([
			{ channelId: "chan-1", reason: "temp-channel:closed" },
		]);
	});

	it("records an admin closing someone else's channel as force_closed", async () => {
		const h = createHarness();
		await h.provision();

		const closed = await h.engine.close("chan-1", ADMIN);
		expect(closed.isOk() && closed.value.reason).toBe("force_closed");

		await h.engine.whenIdle();
		expect(h.platform.messages.at(-1)?.message.content).toBe("🔒 Channel closed by an administrator");
	});

	it("refuses other members", async () => {
		const h = createHarness();
		await h.provision();

		const closed = await h.engine.close("chan-1", STRANGER);
		expect(closed.isErr() && closed.error.code).toBe("NOT_AUTHORIZED");
		expect(h.engine.get("chan-1")?.state).toBe("active");
	});

	it("deletes once when two closes race", async () => {
		const h = createHarness();
		await h.provision();
		const release = h.platform.holdDeletes();

		const [first, second] = await Promise.all([
			h.engine.close("chan-1", OWNER),
			h.engine.close("chan-1", OWNER),
		]);
		expect(first.isOk()).toBe(true);
		expect(second.isErr() && second.error.code).toBe("CHANNEL_CLOSING");

		release();
		await h.engine.whenIdle();
		expect(h.platform.deleteCalls).toHaveLength(1);
		expect(h.store.size).toBe(0);
	});

	it("keeps forceClose for administrators", async () => {
		const h = createHarness();
		await h.provision();

		const owner = await h.engine.forceClose("chan-1", OWNER);
		expect(owner.isErr() && owner.error.code).toBe("NOT_AUTHORIZED");

		const admin = await h.engine.forceClose("chan-1", ADMIN);
		expect(admin.isOk() && admin.value.reason).toBe("force_closed");
	});
});

describe("LifecycleEngine membership", () => {
	it("invites and kicks members of a private channel", async () => {
		const h = createHarness();
		await h.provision({ visibility: "private" });

		const invited = await h.engine.invite("chan-1", OWNER, "user-2");
		expect(invited.isOk() && invited.value.changed).toBe(true);
		expect(h.platform.grantCalls[0]).toEqual({
			channelId: "chan-1",
			delta: {
				upsert: [
					{
						targetId: "user-2",
						targetType: "member",
						allow: ["ViewChannel", "SendMessages", "ReadMessageHistory"],
						deny: [],
					},
				],
				remove: [],
			},
		});
		expect(h.engine.get("chan-1")?.invitedUsers).toEqual(["user-2"]);

		const again = await h.engine.invite("chan-1", OWNER, "user-2");
		expect(again.isOk() && again.value.changed).toBe(false);
		expect(h.platform.grantCalls).toHaveLength(1);

		const kicked = await h.engine.kick("chan-1", OWNER, "user-2");
		expect(kicked.isOk() && kicked.value.changed).toBe(true);
		expect(h.platform.grantCalls[1].delta).toEqual({ upsert: [], remove: ["user-2"] });
		expect(h.engine.get("chan-1")?.invitedUsers).toEqual([]);

		const notMember = await h.engine.kick("chan-1", OWNER, "user-2");
		expect(notMember.isOk() && notMember.value.changed).toBe(false);
	});

	it("counts invites and kicks as activity", async () => {
		const h = createHarness();
		await h.provision({ visibility: "private", duration: durationOf("2h") });

		h.clock.now = 10 * MIN;
		await h.engine.invite("chan-1", OWNER, "user-2");
		expect(h.engine.get("chan-1")?.lastActivityAt).toBe(10 * MIN);
		expect(h.engine.get("chan-1")?.inactivityDeadline).toBe(25 * MIN);

		h.clock.now = 20 * MIN;
		await h.engine.kick("chan-1", OWNER, "user-2");
		expect(h.engine.get("chan-1")?.inactivityDeadline).toBe(35 * MIN);
	});

	it("never kicks the owner", async () => {
		const h = createHarness();
		await h.provision({ visibility: "private" });

		const result = await h.engine.kick("chan-1", ADMIN, OWNER.userId);
		expect(result.isErr() && result.error.code).toBe("INVALID_TARGET");
	});

	it("only manages members of private channels", async () => {
		const h = createHarness();
		await h.provision();

		const result = await h.engine.invite("chan-1", OWNER, "user-2");
		expect(result.isErr() && result.error.code).toBe("NOT_PRIVATE");
	});

	it("refuses members who do not own the channel", async () => {
		const h = createHarness();
		await h.provision({ visibility: "private" });

		const result = await h.engine.invite("chan-1", STRANGER, "user-2");
		expect(result.isErr() && result.error.code).toBe("NOT_AUTHORIZED");
		expect(h.platform.grantCalls).toHaveLength(0);
	});
});

describe("LifecycleEngine external deletion and queries", () => {
	it("drops a channel deleted outside the bot without calling the platform", async () => {
		const h = createHarness();
		await h.provision();
		await h.engine.whenIdle();

		expect(await h.engine.handleChannelRemoved("chan-1")).toBe(true);
		expect(h.store.size).toBe(0);
		expect(h.rateLimiter.snapshot(OWNER.userId).activeCount).toBe(0);
		expect(await h.engine.handleChannelRemoved("chan-1")).toBe(false);

		await h.engine.whenIdle();
		expect(h.platform.deleteCalls).toEqual([]);
		expect(h.platform.messages).toHaveLength(1);
	});

	it("ignores activity in unknown channels", async () => {
		const h = createHarness();
		expect(await h.engine.recordActivity("chan-404", 0)).toBe(false);
	});

	it("lists a user's channels soonest first", async () => {
		const h = createHarness();
		await h.provision({ duration: durationOf("1h") });
		await h.provision({ topic: "Short" });

		expect(h.engine.listOwned(OWNER.userId).map((descriptor) => descriptor.id)).toEqual([
			"chan-2",
			"chan-1",
		]);
		expect(h.engine.listOwned(OWNER.userId, "guild-2")).toEqual([]);
	});

	it("stops working after shutdown", async () => {
		const h = createHarness();
		await h.provision();
		await h.engine.shutdown();

		expect(h.store.size).toBe(0);
		const report = await h.engine.tick(HOUR);
		expect(report.checked).toBe(0);

		const result = await h.engine.provision({
			guildId: "guild-1",
			ownerId: OWNER.userId,
			ownerName: "Owner",
			topic: "Late",
			visibility: "public",
			duration: durationOf("30min"),
		});
		expect(result.isErr() && result.error.code).toBe("PLATFORM_FAILURE");
	});
});
