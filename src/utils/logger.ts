export type Level = "debug" | "info" | "warn" | "error" | "silent";

export const LEVELS: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLevel(value: string): value is Level {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export function createLogger(level: Level) {
  const threshold = LEVELS[level] ?? LEVELS.info;

  const log = (lvl: Exclude<Level, "silent">, msg: string, meta?: Record<string, unknown>) => {
    if (LEVELS[lvl] < threshold) return;
    // eslint-disable-next-line no-console
    console.log(
      JSON.stringify({
        level: lvl,
        msg,
        time: new Date().toISOString(),
        ...meta,
      })
    );
  };

  return {
    debug: (msg: string, meta?: Record<string, unknown>) => log("debug", msg, meta),
    info: (msg: string, meta?: Record<string, unknown>) => log("info", msg, meta),
    warn: (msg: string, meta?: Record<string, unknown>) => log("warn", msg, meta),
    error: (msg: string, meta?: Record<string, unknown>) => log("error", msg, meta),
  };
}

export type Logger = ReturnType<typeof createLogger>;
