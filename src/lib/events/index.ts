import EventEmitter from "eventemitter3";

/**
 * Event name to handler signature, e.g.
 * `{ alert: (event: AlertEvent) => void; summary: (s: RunSummary) => void }`.
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

type Listener = (...args: unknown[]) => void;

/**
 * Type-safe event emitter over eventemitter3.
 *
 * A throwing listener propagates out of `emit()`; callers that must not be
 * interrupted by observers use `emitSafely()`.
 *
 * @example
 * ```ts
 * const events = new TypedEmitter<AlertRunEvents>();
 * events.on("alert", (event) => notify(event));
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler as Listener);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler as Listener);
		return this;
	}

	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler as Listener);
		return this;
	}

	/** @returns true if the event had listeners */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	/**
	 * Emits an event, reporting a listener failure to `onError` instead of
	 * throwing it into the caller.
	 */
	emitSafely<K extends keyof TEvents & string>(
		onError: (error: unknown, event: K) => void,
		event: K,
		...args: Parameters<TEvents[K]>
	): boolean {
		try {
			return this.ee.emit(event, ...args);
		} catch (error) {
			onError(error, event);
			return true;
		}
	}

	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event) {
			this.ee.removeAllListeners(event);
		} else {
			this.ee.removeAllListeners();
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}
}
