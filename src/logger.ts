import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

interface LogLine {
  ts: string;
  level: LogLevel;
  name: string;
  msg: string;
  meta?: unknown;
}

function serializeError(error: Error) {
  return { name: error.name, message: error.message, stack: error.stack };
}

function safeSerialize(meta: unknown): unknown {
  try {
    if (meta instanceof Error) return serializeError(meta);
    return JSON.parse(
      JSON.stringify(meta, (_key, value: unknown) => {
        if (value instanceof Set) return Array.from(value);
        if (value instanceof Map) return Object.fromEntries(value);
        if (typeof value === 'bigint') return value.toString();
        if (value instanceof Error) return serializeError(value);
        return value;
      })
    );
  } catch {
    return { value: String(meta) };
  }
}

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  /** Every line is also appended here (e.g. `outputs/run.log`). */
  file?: string;
  console?: boolean;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly name: string;
  private readonly file: string | null;
  private readonly toConsole: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.name = options.name ?? 'scraper';
    this.file = options.file ?? null;
    this.toConsole = options.console !== false;
    if (this.file) {
      fs.mkdirSync(path.dirname(this.file), { recursive: true });
    }
  }

  private should(level: LogLevel) {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private line(level: LogLevel, msg: string, meta?: unknown) {
    const payload: LogLine = { ts: new Date().toISOString(), level, name: this.name, msg };
    if (meta !== undefined) payload.meta = safeSerialize(meta);
    return JSON.stringify(payload);
  }

  private emit(level: LogLevel, msg: string, meta?: unknown) {
    if (!this.should(level)) return;
    const line = this.line(level, msg, meta);

    if (this.toConsole) {
      if (level === 'error') console.error(line);
      else if (level === 'warn') console.warn(line);
      else if (level === 'debug') console.debug(line);
      else console.log(line);
    }
    if (this.file) {
      fs.appendFileSync(this.file, line + '\n', 'utf-8');
    }
  }

  debug(msg: string, meta?: unknown) {
    this.emit('debug', msg, meta);
  }
  info(msg: string, meta?: unknown) {
    this.emit('info', msg, meta);
  }
  warn(msg: string, meta?: unknown) {
    this.emit('warn', msg, meta);
  }
  error(msg: string, meta?: unknown) {
    this.emit('error', msg, meta);
  }

  child(bindings: Partial<{ name: string; level: LogLevel }>) {
    return new Logger({
      level: bindings.level ?? this.level,
      name: bindings.name ?? this.name,
      file: this.file ?? undefined,
      console: this.toConsole,
    });
  }

  logFile(): string | null {
    return this.file;
  }
}

/** A logger that drops everything, for callers that do not care. */
export const silentLogger = new Logger({ level: 'error', console: false });
