export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const ORDER: Record<Exclude<LogLevel, 'silent'>, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  error(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  debug(msg: string, meta?: unknown): void;
  /** Same level and sink, with `[scope]` prepended to every message. */
  child(scope: string): Logger;
}

export type LogSink = (line: string) => void;

function fmtMeta(meta: unknown) {
  if (meta === undefined) return '';
  if (typeof meta === 'string') return ` ${meta}`;
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [meta-unserializable]';
  }
}

// stdout is reserved for command output (e.g. --format json), so logs go to stderr.
const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

export function createLogger(level: LogLevel = 'info', sink: LogSink = stderrSink, scope?: string): Logger {
  const child = (s: string) => createLogger(level, sink, scope ? `${scope}:${s}` : s);

  if (level === 'silent') {
    const noop = () => {};
    return { error: noop, warn: noop, info: noop, debug: noop, child };
  }

  const threshold = ORDER[level];
  const tag = scope ? `[${scope}] ` : '';

  const emit = (lvl: Exclude<LogLevel, 'silent'>, msg: string, meta: unknown) => {
    if (ORDER[lvl] > threshold) return;
    sink(`${new Date().toISOString()} ${lvl.toUpperCase()} ${tag}${msg}${fmtMeta(meta)}`);
  };

  return {
    error: (msg, meta) => emit('error', msg, meta),
    warn: (msg, meta) => emit('warn', msg, meta),
    info: (msg, meta) => emit('info', msg, meta),
    debug: (msg, meta) => emit('debug', msg, meta),
    child,
  };
}
