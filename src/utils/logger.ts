import { env } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type Meta = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface Logger {
  debug(msg: string, meta?: Meta): void;
  info(msg: string, meta?: Meta): void;
  warn(msg: string, meta?: Meta): void;
  error(msg: string, meta?: Meta): void;
}

// Error instances stringify to {} so flatten them before JSON.stringify.
function serializeMeta(meta: Meta): Meta {
  const out: Meta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

function write(level: LogLevel, message: string, meta?: Meta): void {
  if (LEVELS[level] < LEVELS[env.LOG_LEVEL]) return;
  const ts = new Date().toISOString();
  const fields = meta ? serializeMeta(meta) : undefined;
  const out = env.LOG_FORMAT === 'json'
    ? JSON.stringify({ timestamp: ts, level, message, ...fields })
    : fields ? `[${ts}] [${level.toUpperCase()}] ${message} ${JSON.stringify(fields)}`
             : `[${ts}] [${level.toUpperCase()}] ${message}`;
  if (level === 'error') process.stderr.write(out + '\n');
  else process.stdout.write(out + '\n');
}

/** Logger whose messages are prefixed with `<component>: `. */
export function createLogger(component: string): Logger {
  const prefix = `${component}: `;
  return {
    debug: (msg, meta) => write('debug', prefix + msg, meta),
    info:  (msg, meta) => write('info',  prefix + msg, meta),
    warn:  (msg, meta) => write('warn',  prefix + msg, meta),
    error: (msg, meta) => write('error', prefix + msg, meta),
  };
}

export const logger: Logger = {
  debug: (msg, meta) => write('debug', msg, meta),
  info:  (msg, meta) => write('info',  msg, meta),
  warn:  (msg, meta) => write('warn',  msg, meta),
  error: (msg, meta) => write('error', msg, meta),
};
