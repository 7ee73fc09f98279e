export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Prefix attached to every record, e.g. `coverage:python`. */
  scope?: string;
  /** Defaults to process.stderr; tests pass a collector. */
  sink?: (line: string) => void;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }
  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }
  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  /** Same sink and level, nested scope. */
  child(scope: string): Logger {
    const parent = this.opts.scope;
    return new Logger({ ...this.opts, scope: parent ? `${parent}:${scope}` : scope });
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return levelRank[level] >= levelRank[this.opts.level ?? 'info'];
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, data?: unknown) {
    if (!this.isEnabled(level)) return;

    const timestamp = new Date().toISOString();
    const scope = this.opts.scope;
    const write = this.opts.sink ?? ((line: string) => process.stderr.write(`${line}\n`));

    if (this.opts.json) {
      write(JSON.stringify({ timestamp, level, scope, message, data }));
      return;
    }

    const head = scope ? `${timestamp} ${level} [${scope}] ${message}` : `${timestamp} ${level} ${message}`;
    write(data === undefined ? head : `${head} ${safeJson(data)}`);
  }
}

/** Logger used when the caller does not pass one: warnings and errors only. */
export function defaultLogger(): Logger {
  return new Logger({ level: 'warn' });
}

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
