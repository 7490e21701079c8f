import { describeError } from './errors';

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  verbose?: boolean;
  sink?: LogSink;
}

/**
 * Diagnostics go to stderr so stdout stays reserved for the report.
 */
export class Logger {
  private static sink: LogSink = process.stderr;
  private static verbose = false;

  public static initialize(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.sink = options.sink ?? process.stderr;
  }

  public static log(message: string, operation?: string) {
    if (!this.verbose) {
      return;
    }
    const timestamp = new Date().toISOString();
    const prefix = operation ? `[${operation}] ` : '';
    this.sink.write(`${timestamp} - ${prefix}${message}\n`);
  }

  public static error(message: string, error?: unknown) {
    const timestamp = new Date().toISOString();
    const errStr = error === undefined ? '' : ` ${describeError(error)}`;
    this.sink.write(`${timestamp} - [ERROR] ${message}${errStr}\n`);
  }
}
