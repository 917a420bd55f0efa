import winston from "winston";
import { config } from "./index.js";

/**
 * Shared process logger. Console transport is synchronous, so records written
 * right before `process.exit()` still reach stdout.
 */
export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === "test",
  defaultMeta: { service: "fleet-orchestrator" },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  transports: [new winston.transports.Console()],
});
