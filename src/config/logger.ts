import winston from "winston";
import { config } from "./index.js";

/**
 * Process-wide structured logger.
 *
 * JSON lines on stdout with a timestamp. Silent under `NODE_ENV=test` so test
 * output stays readable; tests that care about log calls spy on the methods.
 */
export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === "test",
  defaultMeta: { service: "embed-token-service" },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  transports: [new winston.transports.Console()],
});
