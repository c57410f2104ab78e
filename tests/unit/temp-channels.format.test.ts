/**
 * Unit Tests: Temp Channel Formatting and Durations
 *
 * Purpose: Verify topic slugs, countdown labels and the accepted duration and
 * extension spellings.
 */

import { describe, expect, it } from "vitest";
import {
	findShortcutByAmount,
	findShortcutByEmoji,
	inactivityGraceFor,
	parseDuration,
} from "@/modules/temp-channels/durations";
import {
	buildChannelName,
	formatCountdown,
	formatRemaining,
	sanitizeTopic,
} from "@/modules/temp-channels/format";

const MIN = 60_000;

describe("sanitizeTopic", () => {
	it("lowercases and hyphenates", () => {
		expect(sanitizeTopic("  Study   Group! ")).toBe("study-group");
	});

	it("keeps letters outside ASCII and collapses separators", () => {
		expect(sanitizeTopic("Café & Crème")).toBe("café-crème");
	});

	it("returns an empty slug when nothing usable is left", () => {
		expect(sanitizeTopic("!!!")).toBe("");
		expect(sanitizeTopic("---")).toBe("");
	});

	it("caps the slug length", () => {
		expect(sanitizeTopic("a".repeat(120))).toHaveLength(80);
	});
});

describe("countdown labels", () => {
	it("rounds partial minutes up", () => {
		expect(formatCountdown(29 * MIN + 1)).toBe("30m");
		expect(formatCountdown(1)).toBe("1m");
		expect(formatCountdown(0)).toBe("0m");
	});

	it("switches to hours past sixty minutes", () => {
		expect(formatCountdown(60 * MIN)).toBe("1h");
		expect(formatCountdown(90 * MIN)).toBe("1h30m");
	});

	it("spaces the remaining time for messages", () => {
		expect(formatRemaining(125 * MIN)).toBe("2h 5m");
		expect(formatRemaining(45 * MIN)).toBe("45m");
		expect(formatRemaining(-5)).toBe("0m");
	});

	it("builds the channel name from slug and countdown", () => {
		expect(buildChannelName("study-group", 115 * MIN)).toBe("⏰・study-group-1h55m");
	});
});

describe("parseDuration", () => {
	it("accepts the listed keys in any case", () => {
		expect(parseDuration(" 1H30M ")?.ms).toBe(90 * MIN);
		expect(parseDuration("30min")?.key).toBe("30min");
	});

	it("maps the short minute spelling to its key", () => {
		expect(parseDuration("45m")?.key).toBe("45min");
	});

	it("rejects anything outside the list", () => {
		expect(parseDuration("7min")).toBeNull();
		expect(parseDuration("90m")).toBeNull();
		expect(parseDuration("forever")).toBeNull();
	});
});

describe("inactivityGraceFor", () => {
	it("keeps the configured grace for long channels", () => {
		expect(inactivityGraceFor(120 * MIN, 15 * MIN)).toBe(15 * MIN);
	});

	it("uses half the lifetime when that is shorter", () => {
		expect(inactivityGraceFor(10 * MIN, 15 * MIN)).toBe(5 * MIN);
		expect(inactivityGraceFor(5 * MIN, 15 * MIN)).toBe(150_000);
	});

	it("never drops under two minutes unless the channel is shorter", () => {
		expect(inactivityGraceFor(3 * MIN, 10 * MIN)).toBe(2 * MIN);
		expect(inactivityGraceFor(1 * MIN, 10 * MIN)).toBe(1 * MIN);
	});
});

describe("extension shortcuts", () => {
	it("finds shortcuts by amount", () => {
		expect(findShortcutByAmount("10min")?.ms).toBe(10 * MIN);
		expect(findShortcutByAmount(" 30M ")?.emoji).toBe("\u{1F55E}");
		expect(findShortcutByAmount("15m")).toBeNull();
	});

	it("finds shortcuts by emoji", () => {
		expect(findShortcutByEmoji("\u{1F550}")?.amount).toBe("5m");
		expect(findShortcutByEmoji("👍")).toBeNull();
		expect(findShortcutByEmoji(null)).toBeNull();
	});
});
