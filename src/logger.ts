export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogFields = Record<string, unknown>;

export interface LoggerOptions {
  level?: LogLevel;
  /** Receives each finished line. Defaults to console.error. */
  write?: (line: string) => void;
  now?: () => Date;
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warning',
  [LogLevel.ERROR]: 'error',
};

// Values made only of these characters are written bare; anything else is quoted.
const BARE_VALUE = /^[A-Za-z0-9\-._/@^+]+$/;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as 'YYYY-MM-DD HH:MM:SS'. */
export function formatTimestamp(time: Date): string {
  const date = `${time.getFullYear()}-${pad(time.getMonth() + 1)}-${pad(time.getDate())}`;
  return `${date} ${pad(time.getHours())}:${pad(time.getMinutes())}:${pad(time.getSeconds())}`;
}

function formatValue(value: unknown): string {
  let text: string;
  if (typeof value === 'string') {
    text = value;
  } else if (value instanceof Error) {
    text = value.message;
  } else if (value !== null && typeof value === 'object') {
    text = JSON.stringify(value);
  } else {
    text = String(value);
  }
  return BARE_VALUE.test(text) ? text : JSON.stringify(text);
}

/**
 * Renders one log line: time, level and msg first, then fields sorted by key.
 * e.g. time="2024-01-02 03:04:05" level=info msg="Recursively browsing" depth=2 url="https://a.example/"
 */
export function formatEntry(time: Date, level: string, message: string, fields: LogFields = {}): string {
  const parts = [
    `time=${formatValue(formatTimestamp(time))}`,
    `level=${level}`,
    `msg=${formatValue(message)}`,
  ];
  for (const key of Object.keys(fields).sort()) {
    parts.push(`${key}=${formatValue(fields[key])}`);
  }
  return parts.join(' ');
}

export class Logger {
  private level: LogLevel;
  private readonly write: (line: string) => void;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.write = options.write ?? ((line) => console.error(line));
    this.now = options.now ?? (() => new Date());
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private log(level: LogLevel, message: string, fields?: LogFields): void {
    if (level < this.level) return;
    this.write(formatEntry(this.now(), LEVEL_NAMES[level], message, fields));
  }

  debug(message: string, fields?: LogFields): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, error?: unknown, fields?: LogFields): void {
    const errorFields = error === undefined ? {} : { error: error instanceof Error ? error.message : String(error) };
    this.log(LogLevel.ERROR, message, { ...fields, ...errorFields });
  }
}
