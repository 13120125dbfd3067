export type LogLevel = "info" | "warn" | "error" | "debug";
export type LogOutputFn = (message: string, level: LogLevel) => void;

export interface LoggerOptions {
  /** Emit debug lines (the `--verbose` command echo and detector diagnostics) */
  debug?: boolean;
  color?: boolean;
  outputFn?: LogOutputFn;
}

/** Results go to stdout through `info`; warnings, errors and debug output go to stderr. */
export class Logger {
  private debugEnabled: boolean;
  private colorEnabled: boolean;
  private outputFn?: LogOutputFn;

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled = options.debug ?? false;
    this.colorEnabled = options.color ?? false;
    this.outputFn = options.outputFn;
  }

  get isColorEnabled(): boolean {
    return this.colorEnabled;
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.debugEnabled) return;
    const formattedMessage = this.formatMessage(message, args);
    if (this.outputFn) {
      this.outputFn(formattedMessage, "debug");
    } else {
      console.error(formattedMessage);
    }
  }

  info(message: string, ...args: unknown[]): void {
    const formattedMessage = this.formatMessage(message, args);
    if (this.outputFn) {
      this.outputFn(formattedMessage, "info");
    } else {
      console.log(formattedMessage);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    const formattedMessage = this.formatMessage(message, args);
    if (this.outputFn) {
      this.outputFn(formattedMessage, "warn");
    } else {
      console.warn(formattedMessage);
    }
  }

  error(message: string, error?: Error | unknown): void {
    let formattedMessage = message;
    if (error instanceof Error) {
      formattedMessage += ` ${error.message}`;
    } else if (error) {
      formattedMessage += ` ${String(error)}`;
    }
    if (this.outputFn) {
      this.outputFn(formattedMessage, "error");
    } else {
      console.error(formattedMessage);
    }
  }

  private formatMessage(message: string, args: unknown[]): string {
    if (args.length === 0) {
      return message;
    }

    return args.reduce<string>((msg, arg) => msg.replace("%s", String(arg)), message);
  }

  static createDefault(debug?: boolean, color?: boolean): Logger {
    return new Logger({ debug, color });
  }
}
