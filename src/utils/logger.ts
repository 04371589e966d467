/***
 * Logger: Per-module log handles feeding one shared LogManager.
 *
 * Each module creates its own handle (`new Logger("Sprite")`) so records
 * carry their source. The manager keeps a short history, forwards every
 * record to an optional listener (a host console overlay, a test spy),
 * and writes records at or above its level to the console.
 *
 * Usage:
 *
 *   const log = new Logger("GameObject");
 *   log.debug("reaped destroyed children", { count: 2 });
 *
 *   Logger.manager.level = LOG_LEVEL.DEBUG;
 *   Logger.manager.on_record((r) => overlay.push(r));
 *
 ***/

import { LOG_HISTORY_LIMIT } from "./constants";

export enum LOG_LEVEL {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface LogRecord {
  readonly level: LOG_LEVEL;
  readonly source: string;
  readonly msg: string;
  readonly context?: Record<string, unknown>;
  readonly index: number;
}

export type LogListener = (record: LogRecord) => void;

export class LogManager {
  public level: LOG_LEVEL = LOG_LEVEL.WARN;

  private readonly history: LogRecord[] = [];
  private listener: LogListener | null = null;
  private record_count = 0;

  /** Records still held, oldest first. */
  public get records(): readonly LogRecord[] {
    return this.history;
  }

  /** Install (or clear) the listener; replays the held history into it. */
  public on_record(listener: LogListener | null): void {
    this.listener = listener;
    if (listener === null) return;
    for (const record of this.history) listener(record);
  }

  public push(record: Omit<LogRecord, "index">): void {
    const full: LogRecord = { ...record, index: this.record_count++ };

    this.history.push(full);
    if (this.history.length > LOG_HISTORY_LIMIT) {
      this.history.shift();
    }

    if (this.listener !== null) {
      this.listener(full);
    }

    if (full.level >= this.level) {
      write_console(full);
    }
  }
}

function write_console(record: LogRecord): void {
  const line = `${record.source}\t${record.msg}`;
  const args: unknown[] =
    record.context === undefined ? [line] : [line, record.context];

  switch (record.level) {
    case LOG_LEVEL.ERROR:
      console.error(...args);
      break;
    case LOG_LEVEL.WARN:
      console.warn(...args);
      break;
    case LOG_LEVEL.INFO:
      console.info(...args);
      break;
    case LOG_LEVEL.DEBUG:
      console.debug(...args);
      break;
    case LOG_LEVEL.SILENT:
      break;
  }
}

export class Logger {
  public static readonly manager = new LogManager();

  constructor(private readonly source: string) {}

  public debug(msg: string, context?: Record<string, unknown>): void {
    Logger.manager.push({ level: LOG_LEVEL.DEBUG, source: this.source, msg, context });
  }

  public info(msg: string, context?: Record<string, unknown>): void {
    Logger.manager.push({ level: LOG_LEVEL.INFO, source: this.source, msg, context });
  }

  public warn(msg: string, context?: Record<string, unknown>): void {
    Logger.manager.push({ level: LOG_LEVEL.WARN, source: this.source, msg, context });
  }
}
