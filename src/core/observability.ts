import { now } from "../types/index.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "fatal"];

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_ORDER;
}

export interface LogEntry {
  unit?: string;
  timestamp: number;
  level: LogLevel;
  component: string;
  message: string;
  data?: unknown;
}

export type LogWriter = (line: string) => void;

const stderrWriter: LogWriter = (line) => {
  // stdout carries the status table printed by the CLI
  process.stderr.write(line + "\n");
};

export class Logger {
  private _unit?: string;

  constructor(
    private readonly component: string,
    private readonly minLevel: LogLevel = "info",
    private readonly write: LogWriter = stderrWriter,
  ) {}

  /** Logger for the same sink and level, tagged with a unit name. */
  forUnit(unit: string): Logger {
    const child = new Logger(this.component, this.minLevel, this.write);
    child._unit = unit;
    return child;
  }

  child(component: string): Logger {
    const child = new Logger(component, this.minLevel, this.write);
    child._unit = this._unit;
    return child;
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }

  fatal(message: string, data?: unknown): void {
    this.log("fatal", message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.minLevel]) {
      return;
    }
    const entry: LogEntry = {
      timestamp: now(),
      level,
      component: this.component,
      message,
    };
    if (this._unit) {
      entry.unit = this._unit;
    }
    if (data !== undefined) {
      entry.data = data;
    }
    this.write(JSON.stringify(entry));
  }
}

/** Discards everything; handy default for library callers and tests. */
export function silentLogger(component = "phosflow"): Logger {
  return new Logger(component, "fatal", () => {});
}
