/**
 * Unit Tests: Event Hooks
 *
 * Purpose: Verify listener registration, one-shot listeners and that a failing
 * listener does not stop the others.
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { createEventHook } from "@/events/hooks/createEventHook";

afterEach(() => {
	vi.restoreAllMocks();
});

describe("createEventHook", () => {
	it("calls every listener with the event arguments", async () => {
		const hook = createEventHook<[string, number]>();
		const first = vi.fn();
		const second = vi.fn();
		hook.on(first);
		const unsubscribe = hook.on(second);

		await hook.emit("chan-1", 1);
		unsubscribe();
		await hook.emit("chan-1", 2);

		expect(first.mock.calls).toEqual([["chan-1", 1], ["chan-1", 2]]);
		expect(second.mock.calls).toEqual([["chan-1", 1]]);
	});

	it("runs once listeners a single time", async () => {
		const [, once, , emit] = createEventHook<[string]>().make();
		const listener = vi.fn();
		once(listener);

		await emit("a");
		await emit("b");

		expect(listener.mock.calls).toEqual([["a"]]);
	});

	it("logs a failing listener and keeps the others running", async () => {
		const logged = vi.spyOn(console, "error").mockImplementation(() => { });
		const hook = createEventHook<[]>({ name: "test" });
		const error = new Error("boom");
		const after = vi.fn();
		hook.on(() => {
			throw error;
		});
		hook.on(after);

		await hook.emit();

		expect(after).toHaveBeenCalledTimes(1);
		expect(logged).toHaveBeenCalledWith("[hooks:test] listener failed", { error });
	});

	it("drops every listener on clear", async () => {
		const hook = createEventHook<[]>();
		const listener = vi.fn();
		hook.on(listener);
		hook.clear();

		await hook.emit();
		expect(listener).not.toHaveBeenCalled();
	});
});
