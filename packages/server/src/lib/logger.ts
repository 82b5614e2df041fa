const LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
export type LogLevel = keyof typeof LEVELS;

function isLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function getThreshold(): number {
  const env = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLevel(env) ? LEVELS[env] : LEVELS.info;
}

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

/** Receives one serialized JSON line per entry. */
export type LogWriter = (level: LogLevel, line: string) => void;

const defaultWriter: LogWriter = (level, line) => {
  if (level === 'error') process.stderr.write(line + '\n');
  else process.stdout.write(line + '\n');
};

let writer: LogWriter = defaultWriter;

/**
 * Redirect every logger's output. Returns a function restoring the previous writer.
 */
export function setLogWriter(next: LogWriter): () => void {
  const previous = writer;
  writer = next;
  return () => {
    writer = previous;
  };
}

/** Errors don't survive JSON.stringify; flatten them with their cause chain. */
function serializable(data: unknown): unknown {
  if (data instanceof Error) {
    const out: Record<string, unknown> = { name: data.name, message: data.message };
    if (data.cause !== undefined) out.cause = serializable(data.cause);
    return out;
  }
  if (data && typeof data === 'object' && !Array.isArray(data)) {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) out[key] = serializable(value);
    return out;
  }
  return data;
}

export function createLogger(namespace: string): Logger {
  const write = (level: LogLevel, msg: string, data?: unknown) => {
    if (LEVELS[level] < getThreshold()) return;
    const entry: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level,
      ns: namespace,
      msg,
    };
    if (data !== undefined) entry.data = serializable(data);
    writer(level, JSON.stringify(entry));
  };

  return {
    debug: (msg, data?) => write('debug', msg, data),
    info: (msg, data?) => write('info', msg, data),
    warn: (msg, data?) => write('warn', msg, data),
    error: (msg, data?) => write('error', msg, data),
  };
}
