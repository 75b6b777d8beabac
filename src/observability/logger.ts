import { LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
}

export type LogWriter = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  minLevel?: LogLevel;
  writer?: LogWriter;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const consoleWriter: LogWriter = (level, line) => {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
};

export class Logger {
  private readonly context: LoggerContext;
  private readonly minLevel: LogLevel;
  private readonly writer: LogWriter;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.minLevel = options.minLevel ?? "info";
    this.writer = options.writer ?? consoleWriter;
  }

  child(component: string): Logger {
    return new Logger({ component, runId: this.context.runId }, { minLevel: this.minLevel, writer: this.writer });
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    this.writer(level, JSON.stringify(payload));
  }
}

/** Logger that drops everything; used where a caller does not care about output. */
export function createSilentLogger(component = "test"): Logger {
  return new Logger({ component, runId: "silent" }, { writer: () => undefined });
}
