export * from "./accounts.js";
export * from "./daily-usage.js";
export * from "./plan-tiers.js";
export * from "./quota-debits.js";
export * from "./rate-limit-entries.js";
export * from "./usage-records.js";
