export type LogLevel = 'trace' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

interface LogEntry {
  level: LogLevel;
  component?: string;
  message: string;
  durationMs?: number;
  sessionId?: string;
}

const LEVEL_RANK: Record<LogThreshold, number> = {
  trace: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isThreshold(value: string | undefined): value is LogThreshold {
  return value !== undefined && value in LEVEL_RANK;
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
let threshold: LogThreshold = isThreshold(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogThreshold): void {
  threshold = level;
}

function formatEntry(entry: LogEntry): string {
  const parts = [`[${new Date().toISOString()}]`, `[${entry.level.toUpperCase()}]`];

  if (entry.sessionId) {
    parts.push(`[session:${entry.sessionId.slice(0, 8)}]`);
  }
  if (entry.component) {
    parts.push(`[${entry.component}]`);
  }

  parts.push(entry.message);

  if (entry.durationMs !== undefined) {
    parts.push(`(${entry.durationMs}ms)`);
  }

  return parts.join(' ');
}

export function log(entry: LogEntry): void {
  if (LEVEL_RANK[entry.level] < LEVEL_RANK[threshold]) return;

  const formatted = formatEntry(entry);
  switch (entry.level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Binds a component name so call sites read `logger.info(msg, sessionId)`. */
export function createLogger(component: string) {
  return {
    trace: (message: string, sessionId?: string, durationMs?: number) =>
      log({ level: 'trace', component, message, sessionId, durationMs }),
    info: (message: string, sessionId?: string, durationMs?: number) =>
      log({ level: 'info', component, message, sessionId, durationMs }),
    warn: (message: string, sessionId?: string) => log({ level: 'warn', component, message, sessionId }),
    error: (message: string, sessionId?: string) => log({ level: 'error', component, message, sessionId }),
  };
}

export type Logger = ReturnType<typeof createLogger>;
