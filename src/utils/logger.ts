type Fields = Record<string, unknown>;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];
type EmitLevel = Exclude<LogLevel, 'silent'>;

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function isLogLevel(v: unknown): v is LogLevel {
  return LOG_LEVELS.some(l => l === v);
}

let threshold: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function toErrorPayload(err: unknown) {
  if (!err) return undefined;
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  if (typeof err === 'object') return err;
  return { message: String(err) };
}

function emit(level: EmitLevel, msg?: string, fields?: Fields) {
  if (RANK[level] < RANK[threshold]) return;
  const m = fields?.msg;
  const fieldMsg = typeof m === 'string' ? m : '';
  const payload: Fields = {
    level,
    time: new Date().toISOString(),
    ...(fields || {}),
    msg: msg || fieldMsg,
  };
  // Normalize embedded error if present
  if (fields?.err !== undefined) {
    payload.err = toErrorPayload(fields.err);
  }
  const line = JSON.stringify(payload);
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function method(level: EmitLevel) {
  return (arg1?: string | Fields, arg2?: string) => {
    if (typeof arg1 === 'string') return emit(level, arg1);
    emit(level, arg2, arg1 || {});
  };
}

export const logger = {
  debug: method('debug'),
  info: method('info'),
  warn: method('warn'),
  error: method('error'),
};

export type { Fields };
