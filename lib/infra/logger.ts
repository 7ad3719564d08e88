import pino, { type Logger } from "pino";

export type { Logger };

const LEVELS = new Set(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

function resolveLevel(raw: string | undefined): string {
  const level = String(raw || "").trim().toLowerCase();
  return LEVELS.has(level) ? level : "info";
}

export function createLogger(options: { level?: string; name?: string } = {}): Logger {
  return pino(
    {
      name: options.name || "research-radar",
      level: resolveLevel(options.level ?? process.env.LOG_LEVEL),
      base: null,
    },
    pino.destination(2),
  );
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export const logger = createLogger();

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
