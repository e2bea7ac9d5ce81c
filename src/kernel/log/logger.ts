// src/kernel/log/logger.ts
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  action: string;
  detail: Record<string, unknown>;
}

export interface LogSink {
  log(entry: LogEntry): void;
  /** Optional level probe so hot paths can skip building debug detail. */
  enabled?(level: LogLevel): boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function isLevelEnabled(sink: LogSink, level: LogLevel): boolean {
  return sink.enabled ? sink.enabled(level) : true;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
}

export class ConsoleLogger implements LogSink {
  private readonly minLevel: number;

  constructor(opts: ConsoleLoggerOptions = {}) {
    this.minLevel = LEVEL_ORDER[opts.level ?? 'info'];
  }

  enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.minLevel;
  }

  log(entry: LogEntry): void {
    if (!this.enabled(entry.level)) return;
    const line = `[${entry.action}] ${formatDetail(entry.detail)}`;
    switch (entry.level) {
      case 'debug':
        console.debug(line);
        return;
      case 'info':
        console.info(line);
        return;
      case 'warn':
        console.warn(line);
        return;
      case 'error':
        console.error(line);
        return;
    }
  }
}

/** Keeps entries in memory for hosts that ship logs elsewhere in batches. */
export class MemoryLogger implements LogSink {
  readonly entries: LogEntry[] = [];
  private readonly minLevel: number;

  constructor(opts: ConsoleLoggerOptions = {}) {
    this.minLevel = LEVEL_ORDER[opts.level ?? 'debug'];
  }

  enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.minLevel;
  }

  log(entry: LogEntry): void {
    if (this.enabled(entry.level)) this.entries.push(entry);
  }

  actions(): string[] {
    return this.entries.map(e => e.action);
  }

  drain(): LogEntry[] {
    return this.entries.splice(0, this.entries.length);
  }
}

/** Sink that drops everything; used when a component is built without one. */
export const SILENT_LOGGER: LogSink = {
  log: () => {},
  enabled: () => false,
};

function formatDetail(detail: Record<string, unknown>): string {
  try {
    return JSON.stringify(detail, (_key, value: unknown) => {
      if (value instanceof Error) return value.message;
      if (value instanceof Uint8Array) return `<${value.length} bytes>`;
      return value;
    });
  } catch {
    return '{"detail":"unserializable"}';
  }
}
