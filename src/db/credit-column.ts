import { customType } from "drizzle-orm/pg-core";
import { Credit } from "../monetization/credit.js";

/**
 * Custom Drizzle column type that stores Credit as BIGINT (raw units)
 * and deserializes to Credit on read.
 *
 * node-postgres hands int8 back as a string and PGlite may hand back a
 * bigint, so reads normalize through Number().
 *
 * Usage in schema:
 * ```ts
 * import { creditColumn } from "../credit-column.js";
 * const myTable = pgTable("my_table", {
 *   cost: creditColumn("cost").notNull(),
 * });
 * ```
 */
export const creditColumn = customType<{
  data: Credit;
  driverData: number | string | bigint;
}>({
  dataType() {
    return "bigint";
  },
  toDriver(value: Credit): number {
    return value.toRaw();
  },
  fromDriver(value: number | string | bigint): Credit {
    return Credit.fromRaw(Number(value));
  },
});
