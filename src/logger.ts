export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  setSink(sink: LogSink): void;
}

const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(`${line}\n`);
};

export class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel = "info",
    private sink: LogSink = stderrSink,
    private readonly now: () => Date = () => new Date()
  ) {}

  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write("error", message, context);
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) {
      return;
    }

    const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : "";
    this.sink(level, `${this.now().toISOString()} [${level.toUpperCase()}] ${message}${suffix}`);
  }
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  setSink: () => undefined
};
