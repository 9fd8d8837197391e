import winston from "winston";

const loggers = new Set<winston.Logger>();

/**
 * Prefixes allowed by LOG_ONLY, or null when every logger may write
 */
const getAllowedLoggers = (): Set<string> | null => {
  const logOnly = process.env.LOG_ONLY;
  if (!logOnly) return null;
  return new Set(logOnly.split(",").map((s) => s.trim()));
};

/**
 * Create a logger whose lines are prefixed with `[prefix]`.
 *
 * Logs to stdout. The level comes from LOG_LEVEL (default `info`) until
 * {@link setLogLevel} applies the configured one. LOG_ONLY takes a comma-separated list of prefixes and
 * silences every other logger, e.g. `LOG_ONLY=WakeupStateMachine,EventQueue`.
 *
 * @example
 * const logger = getLogger("ScoreStore");
 * logger.info("stored 3 scores"); // [ScoreStore] stored 3 scores
 */
export const getLogger = (prefix: string): winston.Logger => {
  const allowedLoggers = getAllowedLoggers();

  const filterFormat = winston.format((info) => {
    const label = typeof info.label === "string" ? info.label : "";
    if (allowedLoggers && !allowedLoggers.has(label)) {
      return false;
    }
    return info;
  });

  const baseLogger = winston.createLogger({
    level: process.env.LOG_LEVEL || "info",
    format: winston.format.combine(
      winston.format.label({ label: prefix }),
      winston.format.timestamp(),
      filterFormat(),
      winston.format.printf(({ label, message }) => {
        return `[${String(label)}] ${String(message)}`;
      }),
    ),
    transports: [new winston.transports.Console()],
  });

  loggers.add(baseLogger);
  return baseLogger;
};

/**
 * Change the level of every logger created so far, e.g. once the
 * configuration file has been read. LOG_LEVEL still wins when set.
 */
export const setLogLevel = (level: string): void => {
  if (process.env.LOG_LEVEL) {
    return;
  }
  for (const logger of loggers) {
    logger.level = level;
  }
};
