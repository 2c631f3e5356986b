import { ConfigService } from '../config/config-service.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogMetadata {
  [key: string]: unknown;
}

export type LogSink = (line: string) => void;

// Always output to stderr to avoid polluting stdout (transformed source is printed there)
const stderrSink: LogSink = line => console.error(line);

/**
 * 取异常的消息文本；非 Error 值转换为字符串。
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 每条日志输出为一行 JSON：`{ level, timestamp, component, message, ...meta }`。
 */
export class Logger {
  constructor(
    private readonly component: string,
    private readonly minLevel: LogLevel = LogLevel.INFO,
    private readonly sink: LogSink = stderrSink
  ) {}

  /**
   * 派生子组件日志器（`run:import-hook`），共享级别与输出。
   */
  child(scope: string): Logger {
    return new Logger(`${this.component}:${scope}`, this.minLevel, this.sink);
  }

  debug(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMetadata): void {
    if (error === undefined) {
      this.log(LogLevel.ERROR, message, meta);
      return;
    }
    const stack = error instanceof Error ? error.stack : undefined;
    this.log(LogLevel.ERROR, message, { error: errorMessage(error), stack, ...meta });
  }

  private log(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (level < this.minLevel) return;

    this.sink(
      JSON.stringify({
        level: LogLevel[level],
        timestamp: new Date().toISOString(),
        component: this.component,
        message,
        ...meta,
      })
    );
  }
}

export function createLogger(component: string): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel);
}
