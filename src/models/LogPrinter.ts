import { safeStringify } from "./utils/safeStringify";

export type PrintStrategy = "pretty" | "plain" | "json";

export type LogLevels =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "critical";

export interface PrintableLog {
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

export type ColorTheme = Record<
  LogLevels | "reset" | "bold" | "dim" | "blue" | "cyan" | "gray",
  string
>;

export type LogWriter = (line: string) => void;

const COLORS: Readonly<ColorTheme> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  critical: "\x1b[35m",
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
};

const NO_COLORS: Readonly<ColorTheme> = {
  trace: "",
  debug: "",
  info: "",
  warn: "",
  error: "",
  critical: "",
  reset: "",
  bold: "",
  dim: "",
  blue: "",
  cyan: "",
  gray: "",
};

const ICONS: Readonly<Record<LogLevels, string>> = {
  trace: "○",
  debug: "◆",
  info: "●",
  warn: "▲",
  error: "✕",
  critical: "█",
};

const defaultWriters = (): { log: LogWriter; error: LogWriter } => ({
  // eslint-disable-next-line no-console
  log: (line) => console.log(line),
  // eslint-disable-next-line no-console
  error: (line) => console.error(line),
});

export class LogPrinter {
  private readonly strategy: PrintStrategy;
  private readonly colors: ColorTheme;

  constructor(options: { strategy: PrintStrategy; useColors: boolean }) {
    this.strategy = options.strategy;
    this.colors =
      options.strategy === "pretty" && options.useColors ? COLORS : NO_COLORS;
  }

  public print(log: PrintableLog): void {
    const writer = this.pickWriter(log.level);
    if (this.strategy === "json") {
      writer(safeStringify(log));
      return;
    }

    const { level, source, message, timestamp, error, data } = log;
    const mainLine = [
      this.strategy === "pretty" ? this.formatTime(timestamp) : "",
      this.formatLevel(level),
      this.formatSource(source),
      this.formatMessage(message),
    ]
      .filter(Boolean)
      .join(" ");

    const output = [mainLine, ...this.formatError(error), ...this.formatData(data)];
    output.forEach((line) => writer(line));
  }

  private pickWriter(level: LogLevels): LogWriter {
    const toError =
      level === "warn" || level === "error" || level === "critical";
    return toError ? LogPrinter.writers.error : LogPrinter.writers.log;
  }

  private formatTime(timestamp: Date): string {
    const time = timestamp.toISOString().slice(11, 23);
    return `${this.colors.gray}${time}${this.colors.reset}`;
  }

  private formatLevel(level: LogLevels): string {
    const label = level.toUpperCase().padEnd(8);
    if (this.strategy === "plain") {
      return label.trimEnd();
    }
    return `${this.colors[level]}${ICONS[level]} ${this.colors.bold}${label}${this.colors.reset}`;
  }

  private formatSource(source?: string): string {
    if (!source) return "";
    return `${this.colors.blue}[${source}]${this.colors.reset}`;
  }

  private formatMessage(message: unknown): string {
    if (typeof message === "object" && message !== null) {
      return safeStringify(message, 2);
    }
    return String(message);
  }

  private formatError(error: PrintableLog["error"]): string[] {
    if (!error) return [];
    return [
      `    ${this.colors.gray}╰─${this.colors.reset} ${this.colors.error}${error.name}: ${error.message}${this.colors.reset}`,
    ];
  }

  private formatData(data?: Record<string, unknown>): string[] {
    if (!data || Object.keys(data).length === 0) return [];
    const formatted = safeStringify(data, 2, { maxDepth: 3 }).split("\n");
    return [
      `    ${this.colors.gray}╰─${this.colors.reset} ${this.colors.cyan}data:${this.colors.reset}`,
      ...formatted.map(
        (line) => `       ${this.colors.dim}${line}${this.colors.reset}`,
      ),
    ];
  }

  private static writers = defaultWriters();

  public static setWriters(writers: Partial<{ log: LogWriter; error: LogWriter }>) {
    LogPrinter.writers = { ...LogPrinter.writers, ...writers };
  }

  public static resetWriters() {
    LogPrinter.writers = defaultWriters();
  }
}
