/**
 * Leveled stderr logger. stdout belongs to the stdio MCP transport, so
 * every level writes through console.error.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class ConsoleLogger implements Logger {
  constructor(
    private readonly prefix: string = "Holster",
    private readonly minLevel: LogLevel = "info"
  ) {}

  format(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const levelTag = level === "info" ? "" : ` ${level.toUpperCase()}:`;
    const contextStr = context ? ` ${JSON.stringify(context)}` : "";
    return `[${this.prefix}]${levelTag} ${message}${contextStr}`;
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    console.error(this.format(level, message, context));
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
}

export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}
