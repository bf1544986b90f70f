import winston from "winston";

const { combine, errors, json, timestamp } = winston.format;

/**
 * Process-wide structured logger.
 *
 * Call as `logger.warn("message", { ...meta })`. The Console transport writes
 * synchronously, so entries logged right before `process.exit` are not lost.
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: combine(timestamp(), errors({ stack: true }), json()),
  defaultMeta: { service: "medscribe-api" },
  transports: [new winston.transports.Console()],
});
