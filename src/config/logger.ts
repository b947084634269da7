import winston from "winston";
import { config } from "./index.js";

/**
 * Process-wide structured logger. Call shape is always
 * `logger.<level>(message, meta)`; meta is merged into the JSON line.
 */
export const logger = winston.createLogger({
  level: config.logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: "llm-tollgate" },
  transports: [new winston.transports.Console({ silent: config.nodeEnv === "test" })],
});
