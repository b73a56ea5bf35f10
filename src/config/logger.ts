import winston from "winston";
import { config } from "./index.js";

/**
 * Console logger. Info lines print bare; other levels carry an upper-case
 * level prefix, and warnings and errors go to stderr.
 */
export const logger = winston.createLogger({
  level: config.logLevel,
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, stack, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
      const text = typeof stack === "string" && level === "debug" ? stack : String(message);
      return level === "info" ? `${text}${metaStr}` : `${level.toUpperCase()} ${text}${metaStr}`;
    }),
  ),
  transports: [new winston.transports.Console({ stderrLevels: ["error", "warn"] })],
});
