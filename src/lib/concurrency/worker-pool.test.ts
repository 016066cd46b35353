import { describe, expect, it } from "vitest";
import { runPool } from "./worker-pool.js";

const tick = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

describe("runPool", () => {
	it("returns outcomes in input order", async () => {
		const outcomes = await runPool([3, 1, 2], async (n) => n * 10, { concurrency: 2 });

		expect(outcomes).toEqual([
			{ item: 3, status: "fulfilled", value: 30 },
			{ item: 1, status: "fulfilled", value: 10 },
			{ item: 2, status: "fulfilled", value: 20 },
		]);
	});

	it("never exceeds the concurrency limit", async () => {
		let inFlight = 0;
		let maxInFlight = 0;

		await runPool(
			Array.from({ length: 10 }, (_, i) => i),
			async () => {
				inFlight++;
				maxInFlight = Math.max(maxInFlight, inFlight);
				await tick();
				inFlight--;
			},
			{ concurrency: 3 },
		);

		expect(maxInFlight).toBe(3);
	});

	it("isolates a failing task", async () => {
		const outcomes = await runPool(
			["a", "b", "c"],
			async (s) => {
				if (s === "b") throw new Error("b failed");
				return s.toUpperCase();
			},
			{ concurrency: 1 },
		);

		expect(outcomes.map((o) => o.status)).toEqual(["fulfilled", "rejected", "fulfilled"]);
		const failed = outcomes[1];
		expect(failed?.status === "rejected" && failed.reason).toEqual(new Error("b failed"));
	});

	it("skips items not started before the signal aborts", async () => {
		const controller = new AbortController();
		const outcomes = await runPool(
			[1, 2, 3],
			async (n) => {
				if (n === 1) controller.abort();
				return n;
			},
			{ concurrency: 1, signal: controller.signal },
		);

		expect(outcomes).toEqual([
			{ item: 1, status: "fulfilled", value: 1 },
			{ item: 2, status: "skipped" },
			{ item: 3, status: "skipped" },
		]);
	});

	it("handles an empty list", async () => {
		await expect(runPool([], async () => 1, { concurrency: 5 })).resolves.toEqual([]);
	});

	it("rejects a non-positive concurrency", async () => {
		await expect(runPool([1], async () => 1, { concurrency: 0 })).rejects.toThrow(
			"concurrency must be a positive integer, got 0",
		);
	});
});
