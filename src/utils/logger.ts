// logger.ts - level-based logging with pluggable formatters and transports

import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import boxen from 'boxen';
import { Writable } from 'stream';
import { formatDate } from './dateFormatter';
import { config } from '../config/server.config';

// --- Configuration ---

const standardLevels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  verbose: 4,
  debug: 5,
  silly: 6,
};

export type LogLevel = keyof typeof standardLevels;
export type LogMeta = Record<string, unknown>;

// --- Interfaces ---

export interface LogEntry {
  level: string;
  message: string | object;
  meta?: LogMeta;
  timestamp: Date;
}

export interface Formatter {
  format(entry: LogEntry): string;
}

export interface Transport {
  log(formattedMessage: string, entry: LogEntry): void;
  level?: string;
  close?(): Promise<void>;
  formatter: Formatter;
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

// --- Formatters ---

export class JsonFormatter implements Formatter {
  format(entry: LogEntry): string {
    let message: unknown = entry.message;
    let meta = entry.meta;
    if (entry.message instanceof Error) {
      message = entry.message.message;
      meta = { ...entry.meta, name: entry.message.name, stack: entry.message.stack };
    }
    const logObject: Record<string, unknown> = {
      level: entry.level,
      message,
      timestamp: formatDate(entry.timestamp),
    };
    if (meta && Object.keys(meta).length > 0) {
      logObject.meta = meta;
    }
    try {
      return JSON.stringify(logObject, jsonReplacer);
    } catch (error) {
      // circular meta
      return JSON.stringify({
        level: entry.level,
        message: `[Unserializable Object: ${error instanceof Error ? error.message : String(error)}]`,
        timestamp: formatDate(entry.timestamp),
      });
    }
  }
}

export interface PrettyFormatterOptions {
  useColors: boolean;
  useBoxes: boolean;
  showTimestamp: boolean;
  /** Meta values longer than this are cut and suffixed with `...`. */
  stringLengthLimit: number;
}

interface LevelStyle {
  color: (s: string) => string;
  icon: string;
  colorName: string;
}

/**
 * PrettyFormatter renders entries for humans: `<icon> LEVEL message` followed by an
 * indented meta block.
 *
 * @example
 * const formatter = new PrettyFormatter({ useColors: false, showTimestamp: true });
 * formatter.format({ level: 'warn', message: 'Rejected request', meta: { reason: 'too many headers' }, timestamp: new Date() });
 */
export class PrettyFormatter implements Formatter {
  private readonly options: PrettyFormatterOptions;

  private static LEVEL_STYLES: Record<string, LevelStyle> = {
    error: { color: chalk.red, icon: '✖', colorName: 'red' },
    warn: { color: chalk.yellow, icon: '⚠', colorName: 'yellow' },
    info: { color: chalk.blueBright, icon: 'ℹ', colorName: 'blueBright' },
    success: { color: chalk.green, icon: '✔', colorName: 'green' },
    http: { color: chalk.magenta, icon: '↔', colorName: 'magenta' },
    verbose: { color: chalk.gray, icon: 'V', colorName: 'gray' },
    debug: { color: chalk.cyan, icon: 'D', colorName: 'cyan' },
    silly: { color: chalk.white, icon: 'S', colorName: 'white' },
  };

  private static DEFAULT_STYLE: LevelStyle = { color: chalk.white, icon: ' ', colorName: 'white' };

  constructor(options: Partial<PrettyFormatterOptions> = {}) {
    this.options = {
      useColors: options.useColors ?? true,
      useBoxes: options.useBoxes ?? false,
      showTimestamp: options.showTimestamp ?? false,
      stringLengthLimit: options.stringLengthLimit ?? 300,
    };
  }

  private formatMessage(message: string | object): string {
    if (typeof message === 'string') return message;
    if (message instanceof Error) return `${message.name}: ${message.message}`;
    return JSON.stringify(message, jsonReplacer);
  }

  private formatMeta(meta: LogMeta): string {
    const limit = this.options.stringLengthLimit;
    const lines = Object.entries(meta).map(([key, value]) => {
      let text: string;
      if (value instanceof Error) {
        text = `${value.name}: ${value.message}`;
      } else if (typeof value === 'string') {
        text = value;
      } else {
        text = JSON.stringify(value, jsonReplacer) ?? String(value);
      }
      if (text.length > limit) text = text.slice(0, limit) + '...';
      return `\t${key}: ${text}`;
    });
    return '\n' + lines.join('\n');
  }

  format(entry: LogEntry): string {
    const { level, message, meta, timestamp } = entry;
    const style = PrettyFormatter.LEVEL_STYLES[level] ?? PrettyFormatter.DEFAULT_STYLE;
    const timestampStr = this.options.showTimestamp ? `[${formatDate(timestamp)}] ` : '';
    const metaBlock = meta && Object.keys(meta).length > 0 ? this.formatMeta(meta) : '';
    const line = `${timestampStr}${style.icon} ${level.toUpperCase()} ${this.formatMessage(message)}${metaBlock}`;

    if (!this.options.useColors) return line;
    if (this.options.useBoxes) {
      return boxen(line, { padding: 1, borderColor: style.colorName });
    }
    return style.color(line);
  }
}

// --- Transports ---

export class ConsoleTransport implements Transport {
  public formatter: Formatter;
  public level?: string;

  constructor(options: { formatter?: Formatter; level?: string } = {}) {
    this.formatter = options.formatter ?? new PrettyFormatter();
    this.level = options.level;
  }

  log(formattedMessage: string, entry: LogEntry): void {
    if (entry.level === 'error') {
      console.error(formattedMessage);
    } else if (entry.level === 'warn') {
      console.warn(formattedMessage);
    } else {
      console.log(formattedMessage);
    }
  }
}

export class FileTransport implements Transport {
  public formatter: Formatter;
  public level?: string;
  private readonly stream: Writable;
  private readonly filename: string;

  constructor(options: { filename: string; formatter?: Formatter; level?: string }) {
    this.filename = options.filename;
    this.formatter = options.formatter ?? new JsonFormatter();
    this.level = options.level;

    fs.mkdirSync(path.dirname(this.filename), { recursive: true });
    this.stream = fs.createWriteStream(this.filename, { flags: 'a' });
    this.stream.on('error', (err) => {
      console.error(`Error writing to log file ${this.filename}:`, err);
    });
  }

  log(formattedMessage: string): void {
    this.stream.write(formattedMessage + '\n');
  }

  close(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.stream.end(() => resolve());
    });
  }
}

// --- Logger Core ---

export interface LoggerOptions {
  level?: string;
  levels?: Record<string, number>;
  transports?: Transport[];
  metadata?: LogMeta;
}

type LogMethod = (message: string | object, meta?: LogMeta) => void;

/**
 * Logger provides level-based logging over any number of transports, with scoped child
 * loggers.
 *
 * @remarks
 * Standard levels (severity 0–6): error, warn, info, http, verbose, debug, silly.
 * `success` logs at info severity. A transport may carry its own, stricter threshold.
 *
 * @example
 * ```ts
 * const log = new Logger({ level: 'debug' });
 * const connLog = log.child({ remoteAddress: '127.0.0.1' });
 * connLog.warn('Rejected request head', { reason: 'invalid header name' });
 * ```
 */
export class Logger {
  private readonly level: string;
  private readonly levels: Record<string, number>;
  private readonly transports: Transport[];
  private readonly metadata: LogMeta;

  constructor(options: LoggerOptions = {}) {
    this.levels = { ...standardLevels, success: standardLevels.info, ...(options.levels ?? {}) };
    this.level = options.level ?? 'info';
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.metadata = options.metadata ?? {};
  }

  error: LogMethod = (message, meta) => this.log('error', message, meta);
  warn: LogMethod = (message, meta) => this.log('warn', message, meta);
  info: LogMethod = (message, meta) => this.log('info', message, meta);
  http: LogMethod = (message, meta) => this.log('http', message, meta);
  verbose: LogMethod = (message, meta) => this.log('verbose', message, meta);
  debug: LogMethod = (message, meta) => this.log('debug', message, meta);
  silly: LogMethod = (message, meta) => this.log('silly', message, meta);
  success: LogMethod = (message, meta) => this.log('success', message, meta);

  /**
   * Emits an entry if `level` passes both the logger threshold and the transport's own.
   * Unknown levels are reported on stderr and dropped.
   */
  log(level: string, message: string | object, meta?: LogMeta): void {
    const levelValue = this.levels[level];
    if (levelValue === undefined) {
      console.warn(`Attempted to log with unknown level: "${level}"`);
      return;
    }
    const configuredLevelValue = this.levels[this.level] ?? standardLevels.info;
    if (levelValue > configuredLevelValue) return;

    const entry: LogEntry = {
      level,
      message,
      meta: { ...this.metadata, ...meta },
      timestamp: new Date(),
    };

    for (const transport of this.transports) {
      const transportLevelValue =
        transport.level !== undefined ? this.levels[transport.level] : configuredLevelValue;
      if (transportLevelValue === undefined || levelValue > transportLevelValue) continue;
      try {
        transport.log(transport.formatter.format(entry), entry);
      } catch (err) {
        console.error(`Error in transport ${transport.constructor.name}:`, err);
      }
    }
  }

  /**
   * Creates a logger sharing this one's level and transports, with `metadata` merged into
   * every entry.
   */
  child(metadata: LogMeta): Logger {
    return new Logger({
      level: this.level,
      levels: this.levels,
      transports: this.transports,
      metadata: { ...this.metadata, ...metadata },
    });
  }

  /** Flushes and closes every transport that holds a stream. */
  async close(): Promise<void> {
    await Promise.all(this.transports.map((transport) => transport.close?.()));
  }
}

// --- Default Export ---

function defaultTransports(): Transport[] {
  const transports: Transport[] = [
    new ConsoleTransport({ formatter: new PrettyFormatter({ useColors: true }) }),
  ];
  if (config.logging.toFile) {
    transports.push(
      new FileTransport({
        filename: path.join(config.logging.logDir, 'app.json'),
        formatter: new JsonFormatter(),
      }),
    );
  }
  return transports;
}

const defaultLogger = new Logger({
  level: config.logging.level,
  transports: defaultTransports(),
});

export default defaultLogger;
export { standardLevels };
