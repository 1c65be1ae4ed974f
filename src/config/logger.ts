import winston from "winston";
import { config } from "./index.js";

const { combine, timestamp, errors, json } = winston.format;

/**
 * Process-wide structured logger.
 *
 * Call as `logger.info("message", { ...meta })`. Never pass plaintext API keys,
 * key hashes or session tokens in the metadata.
 */
export const logger = winston.createLogger({
  level: config.logLevel,
  format: combine(timestamp(), errors({ stack: true }), json()),
  defaultMeta: { service: "housing-price-api" },
  transports: [new winston.transports.Console({ silent: config.nodeEnv === "test" })],
});
