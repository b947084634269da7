/**
 * Monetary amount with sub-cent precision.
 *
 * SCALE = 1,000,000,000 raw units per dollar (nano-dollars).
 * All arithmetic operates on integer raw units. Math.round() is used only
 * at input boundaries (fromDollars, multiply).
 *
 * @example
 * ```ts
 * const perToken = Credit.fromDollars(0.000002); // 2,000 raw units
 * const cost = perToken.multiply(150);          // 300,000 raw units
 * cost.toDollars();                             // 0.0003
 * ```
 */
export class Credit {
  static readonly SCALE = 1_000_000_000;

  private constructor(private readonly raw: number) {}

  /** Create from dollar amount. Rounds to nearest raw unit. */
  static fromDollars(dollars: number): Credit {
    return new Credit(Math.round(dollars * Credit.SCALE));
  }

  /** Create from raw integer units. Throws TypeError if not integer. */
  static fromRaw(raw: number): Credit {
    if (!Number.isInteger(raw)) {
      throw new TypeError(`Credit.fromRaw requires an integer, got ${raw}`);
    }
    if (Math.abs(raw) > Number.MAX_SAFE_INTEGER) {
      throw new RangeError(`Credit.fromRaw value ${raw} exceeds MAX_SAFE_INTEGER`);
    }
    return new Credit(raw);
  }

  /** Convert to dollars (floating point, for display and API responses). */
  toDollars(): number {
    return this.raw / Credit.SCALE;
  }

  /** Raw integer units (what gets stored in the database). */
  toRaw(): number {
    return this.raw;
  }

  /** Multiply by a factor, rounding to nearest raw unit. */
  multiply(factor: number): Credit {
    return new Credit(Math.round(this.raw * factor));
  }
}
