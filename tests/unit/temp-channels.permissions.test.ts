/**
 * Unit Tests: Temp Channel Permission Planning
 *
 * Purpose: Verify the overwrites planned for new channels and the invite/kick
 * deltas.
 */

import { describe, expect, it } from "vitest";
import {
	EMPTY_DELTA,
	isEmptyDelta,
	planCreate,
	planInvite,
	planKick,
} from "@/modules/temp-channels/permissions";
import type { CategoryDefaults, ChannelDescriptor } from "@/modules/temp-channels/types";

const category: CategoryDefaults = {
	categoryId: "category-1",
	everyoneRoleId: "guild-1",
	botId: "bot-1",
	inherited: [
		{ targetId: "role-mods", targetType: "role", allow: ["ViewChannel", "ManageMessages"], deny: [] },
	],
};

function descriptor(invited: string[] = []): ChannelDescriptor {
	return {
		id: "chan-1",
		guildId: "guild-1",
		ownerId: "owner-1",
		ownerName: "Owner",
		topic: "Study",
		slug: "study",
		visibility: "private",
		durationLabel: "30min",
		createdAt: 0,
		expiresAt: 1_800_000,
		lastActivityAt: null,
		inactivityDeadline: 1_800_000,
		invitedUsers: new Set(invited),
		state: "active",
		deletionReason: null,
		warnedFor: null,
		warningMessageId: null,
		renderedName: null,
		renamedAt: 0,
		extensions: 0,
	};
}

describe("planCreate", () => {
	it("opens public channels to everyone and keeps category grants", () => {
		const grants = planCreate("public", "owner-1", category, ["user-2"]);

		expect(grants.map((grant) => grant.targetId)).toEqual(["role-mods", "guild-1", "owner-1", "bot-1"]);
		expect(grants[0].allow).toEqual(["ViewChannel", "ManageMessages"]);
		expect(grants[1]).toEqual({
			targetId: "guild-1",
			targetType: "role",
			allow: ["ViewChannel"],
			deny: [],
		});
	});

	it("hides private channels and strips inherited view rights", () => {
		const grants = planCreate("private", "owner-1", category, ["user-2"]);

		expect(grants.map((grant) => grant.targetId)).toEqual([
			"role-mods",
			"guild-1",
			"user-2",
			"owner-1",
			"bot-1",
		]);
		expect(grants[0].allow).toEqual(["ManageMessages"]);
		expect(grants[1].deny).toEqual(["ViewChannel"]);
		expect(grants[2].allow).toEqual(["ViewChannel", "SendMessages", "ReadMessageHistory"]);
	});

	it("gives the owner and the bot their own access sets", () => {
		const grants = planCreate("private", "owner-1", category);

		expect(grants.find((grant) => grant.targetId === "owner-1")?.allow).toEqual([
			"ViewChannel",
			"SendMessages",
			"ReadMessageHistory",
			"ManageMessages",
		]);
		expect(grants.find((grant) => grant.targetId === "bot-1")?.allow).toEqual([
			"ViewChannel",
			"SendMessages",
			"ReadMessageHistory",
			"ManageMessages",
			"ManageChannels",
			"AddReactions",
		]);
	});
});

describe("membership deltas", () => {
	it("grants access to new members only", () => {
		expect(planInvite(descriptor(), "user-2").upsert.map((grant) => grant.targetId)).toEqual(["user-2"]);
		expect(planInvite(descriptor(["user-2"]), "user-2")).toBe(EMPTY_DELTA);
		expect(planInvite(descriptor(), "owner-1")).toBe(EMPTY_DELTA);
	});

	it("removes current members only and never the owner", () => {
		expect(planKick(descriptor(["user-2"]), "user-2")).toEqual({ upsert: [], remove: ["user-2"] });
		expect(isEmptyDelta(planKick(descriptor(), "user-2"))).toBe(true);
		expect(isEmptyDelta(planKick(descriptor(["owner-1"]), "owner-1"))).toBe(true);
	});
});
