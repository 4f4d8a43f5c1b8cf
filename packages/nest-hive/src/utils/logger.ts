/** Lifecycle events `HiveRuntime` reports for each alert. */
export type HiveLogEvent = 'alert-built' | 'alert-sent' | 'alert-failed';

/** Structured fields attached to every alert log line. */
export interface HiveLogRecord {
  event: HiveLogEvent;
  rule?: string;
  sourceRef?: string;
  [field: string]: unknown;
}

export type HiveLogLevel = 'debug' | 'info' | 'error';

/**
 * Logger accepted by `HiveModule` config. Any object with these three methods
 * works, e.g. a Nest `Logger` wrapper or a pino child logger.
 */
export type LoggerPort = Record<HiveLogLevel, (message: string, record: HiveLogRecord) => void>;

/** Console logger used when no custom `LoggerPort` is configured. */
export class HiveLogger implements LoggerPort {
  constructor(private readonly scope = 'nest-hive') {}

  debug(message: string, record: HiveLogRecord): void {
    this.print('DEBUG', message, record);
  }

  info(message: string, record: HiveLogRecord): void {
    this.print('INFO', message, record);
  }

  error(message: string, record: HiveLogRecord): void {
    this.print('ERROR', message, record);
  }

  private print(level: Uppercase<HiveLogLevel>, message: string, record: HiveLogRecord): void {
    const { event, ...fields } = record;
    const line = `[${this.scope}] [${level}] ${message} (${event})`;
    const write = level === 'ERROR' ? console.error : console.log;
    if (Object.keys(fields).length > 0) {
      write(line, fields);
      return;
    }
    write(line);
  }
}
