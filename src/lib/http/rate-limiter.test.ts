import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError, RateLimitTimeoutError } from "../../shared/errors.js";
import { FakeClock, SystemClock } from "../../shared/time.js";
import { TokenBucketRateLimiter } from "./rate-limiter.js";

describe("TokenBucketRateLimiter", () => {
	describe("bucket arithmetic", () => {
		function createLimiter(capacity = 5, refillRate = 1) {
			const clock = new FakeClock(1000);
			const limiter = new TokenBucketRateLimiter({ capacity, refillRate, clock });
			return { limiter, clock };
		}

		it("starts full and drains on tryAcquire", () => {
			const { limiter } = createLimiter(3);
			expect(limiter.tryAcquire()).toBe(true);
			expect(limiter.tryAcquire()).toBe(true);
			expect(limiter.tryAcquire()).toBe(true);
			expect(limiter.tryAcquire()).toBe(false);
			expect(limiter.availableTokens()).toBe(0);
		});

		it("refills over time without exceeding capacity", () => {
			const { limiter, clock } = createLimiter(5, 2);
			for (let i = 0; i < 5; i++) limiter.tryAcquire();

			clock.advance(1500);
			expect(limiter.availableTokens()).toBe(3);

			clock.advance(10_000);
			expect(limiter.availableTokens()).toBe(5);
		});

		it("reports time until the next token", () => {
			const { limiter, clock } = createLimiter(1, 4);
			expect(limiter.timeUntilNextTokenMs()).toBe(0);
			limiter.tryAcquire();
			expect(limiter.timeUntilNextTokenMs()).toBe(250);
			clock.advance(125);
			expect(limiter.timeUntilNextTokenMs()).toBe(125);
		});

		it("never refills at rate zero", () => {
			const { limiter, clock } = createLimiter(1, 0);
			limiter.tryAcquire();
			clock.advance(60_000);
			expect(limiter.timeUntilNextTokenMs()).toBe(Number.POSITIVE_INFINITY);
		});

		it("rejects invalid configuration", () => {
			const clock = new FakeClock();
			expect(() => new TokenBucketRateLimiter({ capacity: 0, refillRate: 1, clock })).toThrow(
				ConfigurationError,
			);
			expect(() => new TokenBucketRateLimiter({ capacity: 1, refillRate: -1, clock })).toThrow(
				"refillRate must be >= 0",
			);
		});
	});

	describe("acquire", () => {
		beforeEach(() => {
			vi.useFakeTimers({ now: 0 });
		});

		afterEach(() => {
			vi.useRealTimers();
		});

		it("spaces admissions 1/rate apart with capacity 1", async () => {
			const limiter = new TokenBucketRateLimiter({ capacity: 1, refillRate: 10, clock: SystemClock });
			await limiter.acquire();
			expect(Date.now()).toBe(0);

			const admitted: number[] = [];
			const second = limiter.acquire().then(() => admitted.push(Date.now()));
			const third = limiter.acquire().then(() => admitted.push(Date.now()));
			expect(limiter.pending).toBe(2);

			await vi.advanceTimersByTimeAsync(250);
			await Promise.all([second, third]);

			expect(admitted).toEqual([100, 200]);
			expect(limiter.pending).toBe(0);
		});

		it("does not let tryAcquire jump ahead of waiters", async () => {
			const limiter = new TokenBucketRateLimiter({ capacity: 1, refillRate: 10, clock: SystemClock });
			await limiter.acquire();
			const waiting = limiter.acquire();

			await vi.advanceTimersByTimeAsync(99);
			expect(limiter.tryAcquire()).toBe(false);

			await vi.advanceTimersByTimeAsync(1);
			await waiting;
			expect(limiter.pending).toBe(0);
		});

		it("rejects a waiter whose budget runs out", async () => {
			const limiter = new TokenBucketRateLimiter({ capacity: 1, refillRate: 1, clock: SystemClock });
			await limiter.acquire();

			const pending = limiter.acquire({ maxWaitMs: 200 }).catch((e: unknown) => e);
			await vi.advanceTimersByTimeAsync(200);
			const error = await pending;

			expect(error).toBeInstanceOf(RateLimitTimeoutError);
			expect(error).toMatchObject({
				message: "Timeout waiting for rate limit token",
				waitedMs: 200,
			});
			expect(limiter.getStats().timeouts).toBe(1);
		});

		it("fails at once when the deadline has already passed", async () => {
			const limiter = new TokenBucketRateLimiter({ capacity: 1, refillRate: 1, clock: SystemClock });
			await limiter.acquire();

			await expect(limiter.acquire({ deadline: 0 })).rejects.toThrow(
				"Wait budget exhausted before rate limit token",
			);
		});

		it("rejects a waiter when its signal aborts", async () => {
			const limiter = new TokenBucketRateLimiter({ capacity: 1, refillRate: 1, clock: SystemClock });
			await limiter.acquire();
			const controller = new AbortController();

			const pending = limiter.acquire({ signal: controller.signal }).catch((e: unknown) => e);
			await vi.advanceTimersByTimeAsync(50);
			controller.abort();
			const error = await pending;

			expect(error).toBeInstanceOf(RateLimitTimeoutError);
			expect(error).toMatchObject({
				message: "Aborted while waiting for rate limit token",
				waitedMs: 50,
			});
			expect(limiter.pending).toBe(0);
		});

		it("tracks hits, waits and average wait", async () => {
			const limiter = new TokenBucketRateLimiter({ capacity: 1, refillRate: 10, clock: SystemClock });
			await limiter.acquire();
			const waiting = limiter.acquire();
			await vi.advanceTimersByTimeAsync(100);
			await waiting;

			expect(limiter.getStats()).toEqual({
				hits: 2,
				misses: 0,
				waits: 1,
				timeouts: 0,
				avgWaitMs: 100,
			});

			limiter.resetStats();
			expect(limiter.getStats().hits).toBe(0);
		});
	});
});
