export type Logger = Pick<Console, "log" | "warn" | "error">;

export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
  error: () => {},
};

function clock(date: Date): string {
  return date.toTimeString().slice(0, 8);
}

/** Timestamped progress line, e.g. `[14:02:11] Fetching library ...`. */
export function logProgress(logger: Logger, message: string, now: Date = new Date()) {
  logger.log(`[${clock(now)}] ${message}`);
}

export function logBanner(logger: Logger, title: string) {
  const rule = "=".repeat(60);
  logger.log(rule);
  logger.log(title);
  logger.log(rule);
}
