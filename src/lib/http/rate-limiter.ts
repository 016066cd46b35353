import { ConfigurationError, RateLimitTimeoutError } from "../../shared/errors.js";
import type { Clock } from "../../shared/time.js";

/**
 * Configuration for TokenBucketRateLimiter.
 */
export interface RateLimiterConfig {
	/** Burst size. 1 enforces a strict minimum spacing of 1/refillRate. */
	readonly capacity: number;
	/** Tokens added per second. */
	readonly refillRate: number;
	readonly clock: Clock;
	/** Wait budget applied when acquire() is called without one (default 30000ms). */
	readonly defaultMaxWaitMs?: number;
}

/** Per-call limits on how long acquire() may wait. */
export interface AcquireOptions {
	/** Longest this caller may wait, in ms. */
	readonly maxWaitMs?: number;
	/** Absolute epoch ms (per the limiter's clock) after which waiting fails. */
	readonly deadline?: number;
	readonly signal?: AbortSignal;
}

/** Snapshot of rate limiter usage statistics. */
export interface RateLimiterStats {
	readonly hits: number;
	readonly misses: number;
	readonly waits: number;
	readonly timeouts: number;
	readonly avgWaitMs: number;
}

interface Waiter {
	readonly startMs: number;
	readonly resolve: () => void;
	readonly reject: (error: Error) => void;
	timeout: ReturnType<typeof setTimeout> | null;
	detachSignal: () => void;
}

/**
 * Token-bucket rate limiter shared by every provider request of a run.
 *
 * Tokens accumulate at `refillRate` tokens/second up to `capacity`.
 * `acquire()` callers are served first-in first-out; a caller that cannot be
 * admitted within its wait budget is rejected with RateLimitTimeoutError.
 */
export class TokenBucketRateLimiter {
	private readonly capacity: number;
	private readonly refillRate: number;
	private readonly clock: Clock;
	private readonly defaultMaxWaitMs: number;
	private tokens: number;
	private lastRefillMs: number;
	private readonly waiters: Waiter[] = [];
	private pumpTimer: ReturnType<typeof setTimeout> | null = null;

	private _hits = 0;
	private _misses = 0;
	private _waits = 0;
	private _timeouts = 0;
	private _totalWaitMs = 0;

	constructor(config: RateLimiterConfig) {
		if (config.capacity < 1) {
			throw new ConfigurationError("capacity must be >= 1", { capacity: config.capacity });
		}
		if (config.refillRate < 0) {
			throw new ConfigurationError("refillRate must be >= 0", { refillRate: config.refillRate });
		}
		this.capacity = config.capacity;
		this.refillRate = config.refillRate;
		this.clock = config.clock;
		this.defaultMaxWaitMs = config.defaultMaxWaitMs ?? 30_000;
		this.tokens = config.capacity;
		this.lastRefillMs = this.clock.now();
	}

	/**
	 * Attempts to acquire one token without blocking. Never jumps the queue
	 * ahead of callers already waiting in acquire().
	 * @returns true if a token was acquired, false otherwise.
	 */
	tryAcquire(): boolean {
		const acquired = this.waiters.length === 0 && this.rawTryAcquire();
		if (acquired) {
			this._hits++;
		} else {
			this._misses++;
		}
		return acquired;
	}

	/**
	 * Waits until a token is available, then takes it.
	 * @throws RateLimitTimeoutError if the wait budget or deadline expires, or the signal aborts.
	 * @example
	 * await limiter.acquire({ maxWaitMs: 5_000 });
	 * const response = await fetch(url);
	 */
	acquire(options: AcquireOptions = {}): Promise<void> {
		if (this.waiters.length === 0 && this.rawTryAcquire()) {
			this._hits++;
			return Promise.resolve();
		}

		const startMs = this.clock.now();
		const budgetMs = Math.min(
			options.maxWaitMs ?? this.defaultMaxWaitMs,
			options.deadline !== undefined ? options.deadline - startMs : Number.POSITIVE_INFINITY,
		);
		if (budgetMs <= 0 || options.signal?.aborted) {
			this._timeouts++;
			return Promise.reject(
				new RateLimitTimeoutError("Wait budget exhausted before rate limit token", 0, {
					aborted: options.signal?.aborted ?? false,
				}),
			);
		}

		this._waits++;
		return new Promise<void>((resolve, reject) => {
			const waiter: Waiter = {
				startMs,
				resolve,
				reject,
				timeout: null,
				detachSignal: () => {},
			};
			waiter.timeout = setTimeout(() => this.expire(waiter, false), budgetMs);
			const signal = options.signal;
			if (signal) {
				const onAbort = (): void => this.expire(waiter, true);
				signal.addEventListener("abort", onAbort, { once: true });
				waiter.detachSignal = () => signal.removeEventListener("abort", onAbort);
			}
			this.waiters.push(waiter);
			this.schedulePump();
		});
	}

	/**
	 * Returns the current number of available tokens (after refill).
	 * @returns Number of tokens available (floored to integer).
	 */
	availableTokens(): number {
		this.refill();
		return Math.floor(this.tokens);
	}

	/**
	 * Returns the time in milliseconds until the next token becomes available.
	 * @returns 0 if tokens are available now, Infinity if refillRate is 0
	 * and no tokens are available, otherwise milliseconds to wait.
	 */
	timeUntilNextTokenMs(): number {
		this.refill();
		if (this.tokens >= 1) {
			return 0;
		}
		if (this.refillRate === 0) {
			return Number.POSITIVE_INFINITY;
		}
		return Math.ceil(((1 - this.tokens) / this.refillRate) * 1000);
	}

	/** Number of callers currently blocked in acquire(). */
	get pending(): number {
		return this.waiters.length;
	}

	/** Returns a snapshot of rate limiter usage statistics. */
	getStats(): RateLimiterStats {
		return {
			hits: this._hits,
			misses: this._misses,
			waits: this._waits,
			timeouts: this._timeouts,
			avgWaitMs: this._waits > 0 ? this._totalWaitMs / this._waits : 0,
		};
	}

	/** Resets all usage statistics counters to zero. */
	resetStats(): void {
		this._hits = 0;
		this._misses = 0;
		this._waits = 0;
		this._timeouts = 0;
		this._totalWaitMs = 0;
	}

	// ── Internal ──────────────────────────────────────────────────

	/** Acquires a token without updating stats. */
	private rawTryAcquire(): boolean {
		this.refill();
		if (this.tokens >= 1) {
			this.tokens -= 1;
			return true;
		}
		return false;
	}

	private pump(): void {
		this.pumpTimer = null;
		while (this.waiters.length > 0 && this.rawTryAcquire()) {
			const waiter = this.waiters.shift();
			if (!waiter) break;
			this.settle(waiter);
			this._hits++;
			this._totalWaitMs += this.clock.now() - waiter.startMs;
			waiter.resolve();
		}
		this.schedulePump();
	}

	private schedulePump(): void {
		if (this.pumpTimer !== null || this.waiters.length === 0) return;
		const waitMs = this.timeUntilNextTokenMs();
		// refillRate 0: waiters can only leave through their own timeouts
		if (!Number.isFinite(waitMs)) return;
		this.pumpTimer = setTimeout(() => this.pump(), waitMs);
	}

	private expire(waiter: Waiter, aborted: boolean): void {
		const idx = this.waiters.indexOf(waiter);
		if (idx === -1) return;
		this.waiters.splice(idx, 1);
		this.settle(waiter);
		this._timeouts++;
		const waitedMs = this.clock.now() - waiter.startMs;
		waiter.reject(
			new RateLimitTimeoutError(
				aborted ? "Aborted while waiting for rate limit token" : "Timeout waiting for rate limit token",
				waitedMs,
				{ aborted },
			),
		);
		if (this.waiters.length === 0 && this.pumpTimer !== null) {
			clearTimeout(this.pumpTimer);
			this.pumpTimer = null;
		}
	}

	private settle(waiter: Waiter): void {
		if (waiter.timeout !== null) {
			clearTimeout(waiter.timeout);
			waiter.timeout = null;
		}
		waiter.detachSignal();
	}

	private refill(): void {
		const now = this.clock.now();
		const elapsedMs = now - this.lastRefillMs;
		if (elapsedMs <= 0) return;

		const newTokens = (elapsedMs / 1000) * this.refillRate;
		this.tokens = Math.min(this.capacity, this.tokens + newTokens);
		this.lastRefillMs = now;
	}
}
