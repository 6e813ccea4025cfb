import { LogPrinter, PrintStrategy, LogLevels } from "./LogPrinter";

export type { LogLevels, PrintStrategy };

export interface ILogInfo {
  source?: string;
  error?: unknown;
  data?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface ILog {
  level: LogLevels;
  source?: string;
  message: unknown;
  timestamp: Date;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  data?: Record<string, unknown>;
  context?: Record<string, unknown>;
}

export type LogListener = (log: ILog) => void;

export interface LoggerOptions {
  printThreshold: null | LogLevels;
  printStrategy: PrintStrategy;
  useColors?: boolean;
}

/**
 * Structured, synchronous logger. Child loggers created with `with()` share
 * the root's listeners and printer.
 */
export class Logger {
  private readonly printThreshold: null | LogLevels;
  private readonly printStrategy: PrintStrategy;
  private readonly boundContext: Record<string, unknown>;
  private readonly useColors: boolean;
  private readonly printer: LogPrinter;
  private readonly source?: string;
  private rootLogger?: Logger;
  public localListeners: LogListener[] = [];

  public static Severity: Readonly<Record<LogLevels, number>> = {
    trace: 0,
    debug: 1,
    info: 2,
    warn: 3,
    error: 4,
    critical: 5,
  };

  constructor(
    options: LoggerOptions,
    boundContext: Record<string, unknown> = {},
    source?: string,
    printer?: LogPrinter,
  ) {
    this.boundContext = { ...boundContext };
    this.printThreshold = options.printThreshold;
    this.printStrategy = options.printStrategy;
    this.useColors =
      typeof options.useColors === "boolean"
        ? options.useColors
        : Logger.detectColorSupport();
    this.source = source;
    this.printer =
      printer ??
      new LogPrinter({
        strategy: this.printStrategy,
        useColors: this.useColors,
      });
  }

  private static detectColorSupport(): boolean {
    // Respect NO_COLOR convention
    if (process.env.NO_COLOR) return false;
    return !!process.stdout && !!process.stdout.isTTY;
  }

  /**
   * Creates a new logger instance with additional bound context
   */
  public with({
    source,
    additionalContext,
  }: {
    source?: string;
    additionalContext?: Record<string, unknown>;
  }): Logger {
    const child = new Logger(
      {
        printThreshold: this.printThreshold,
        printStrategy: this.printStrategy,
        useColors: this.useColors,
      },
      { ...this.boundContext, ...additionalContext },
      source ?? this.source,
      this.printer,
    );
    child.rootLogger = this.rootLogger ?? this;
    return child;
  }

  public log(level: LogLevels, message: unknown, logInfo: ILogInfo = {}): void {
    const { source, error, data, ...context } = logInfo;

    const log: ILog = {
      level,
      message,
      source: source ?? this.source,
      timestamp: new Date(),
      error: error === undefined ? undefined : this.extractErrorInfo(error),
      data,
      context: { ...this.boundContext, ...context },
    };

    const root = this.rootLogger ?? this;
    root.triggerLogListeners(log);
    if (root.canPrint(level)) {
      root.printer.print(log);
    }
  }

  private extractErrorInfo(error: unknown): NonNullable<ILog["error"]> {
    if (error instanceof Error) {
      return { name: error.name, message: error.message, stack: error.stack };
    }
    return { name: "UnknownError", message: String(error) };
  }

  public info(message: unknown, logInfo?: ILogInfo) {
    this.log("info", message, logInfo);
  }

  public error(message: unknown, logInfo?: ILogInfo) {
    this.log("error", message, logInfo);
  }

  public warn(message: unknown, logInfo?: ILogInfo) {
    this.log("warn", message, logInfo);
  }

  public debug(message: unknown, logInfo?: ILogInfo) {
    this.log("debug", message, logInfo);
  }

  public trace(message: unknown, logInfo?: ILogInfo) {
    this.log("trace", message, logInfo);
  }

  public critical(message: unknown, logInfo?: ILogInfo) {
    this.log("critical", message, logInfo);
  }

  /**
   * @param listener - A listener that will be triggered for every log.
   */
  public onLog(listener: LogListener) {
    const root = this.rootLogger ?? this;
    root.localListeners.push(listener);
  }

  private canPrint(level: LogLevels): boolean {
    if (this.printThreshold === null) {
      return false;
    }
    return Logger.Severity[level] >= Logger.Severity[this.printThreshold];
  }

  private triggerLogListeners(log: ILog) {
    for (const listener of this.localListeners) {
      try {
        listener(log);
      } catch (error) {
        // Listener failures are printed, never rethrown.
        this.printer.print({
          level: "error",
          message: "Error in log listener",
          timestamp: new Date(),
          error: this.extractErrorInfo(error),
        });
      }
    }
  }
}
