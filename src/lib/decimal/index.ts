/**
 * Decimal: wrapper around decimal.js-light for price arithmetic.
 *
 * Percent changes are compared against thresholds at exact boundaries
 * (+5.00% must alert, +4.99% must not), so they are computed in decimal
 * rather than binary floating point. Numbers are converted through their
 * shortest string form, so `Decimal.from(104.9)` is exactly 104.9.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

export class Decimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * @throws Error if value is not finite (for numbers) or empty (for strings)
	 * @example Decimal.from("123.45")
	 */
	static from(value: string | number): Decimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`Decimal.from: invalid number ${value}`);
			}
			return new Decimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("Decimal.from: empty string");
		}
		return new Decimal(new DecimalLight(trimmed));
	}

	static zero(): Decimal {
		return new Decimal(new DecimalLight(0));
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: Decimal): Decimal {
		return new Decimal(this.raw.plus(other.raw));
	}

	sub(other: Decimal): Decimal {
		return new Decimal(this.raw.minus(other.raw));
	}

	mul(other: Decimal): Decimal {
		return new Decimal(this.raw.times(other.raw));
	}

	/** @throws Error on division by zero */
	div(other: Decimal): Decimal {
		if (other.raw.isZero()) {
			throw new Error("Decimal.div: division by zero");
		}
		return new Decimal(this.raw.dividedBy(other.raw));
	}

	abs(): Decimal {
		return new Decimal(this.raw.absoluteValue());
	}

	neg(): Decimal {
		return new Decimal(this.raw.negated());
	}

	// ── Comparison ─────────────────────────────────────────────────

	cmp(other: Decimal): -1 | 0 | 1 {
		const c = this.raw.comparedTo(other.raw);
		return c < 0 ? -1 : c > 0 ? 1 : 0;
	}

	gte(other: Decimal): boolean {
		return this.raw.greaterThanOrEqualTo(other.raw);
	}

	lte(other: Decimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	gt(other: Decimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	isNegative(): boolean {
		return this.raw.isNegative();
	}

	// ── Conversion ─────────────────────────────────────────────────

	toNumber(): number {
		return this.raw.toNumber();
	}

	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	toString(): string {
		return this.raw.toString();
	}
}
