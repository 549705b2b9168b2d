interface LogContext {
  sessionId?: string;
  turnId?: number;
  eventId?: string;
  trace?: string;
}

const LEVELS = ["debug", "info", "warn", "error"] as const;

type LogLevel = (typeof LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function contextPrefix(context?: LogContext): string {
  if (!context) {
    return "";
  }

  const parts: string[] = [];
  if (context.sessionId) parts.push(`session=${context.sessionId}`);
  if (context.turnId !== undefined) parts.push(`turn=${context.turnId}`);
  if (context.eventId) parts.push(`event=${context.eventId}`);
  if (context.trace) parts.push(`trace=${context.trace}`);

  return parts.length ? `[${parts.join(" ")}] ` : "";
}

// LOG_LEVEL is read per record, not at import.
function threshold(): number {
  const configured = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  const level = LEVELS.find((name) => name === configured);
  return LEVEL_RANK[level ?? "info"];
}

function write(level: LogLevel, message: string, context?: LogContext): void {
  if (LEVEL_RANK[level] < threshold()) {
    return;
  }
  SINKS[level](`${new Date().toISOString()} ${level.toUpperCase()} ${contextPrefix(context)}${message}`);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const logger = {
  debug: (message: string, context?: LogContext): void => write("debug", message, context),
  info: (message: string, context?: LogContext): void => write("info", message, context),
  warn: (message: string, context?: LogContext): void => write("warn", message, context),
  error: (message: string, context?: LogContext): void => write("error", message, context),
};

export type { LogContext, LogLevel };
