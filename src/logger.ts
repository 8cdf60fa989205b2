type Level = "debug" | "info" | "warn" | "error";

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  debugEnabled?: boolean;
  scope?: string;
  sink?: LogSink;
  now?: () => Date;
}

const stdoutSink: LogSink = (line) => {
  process.stdout.write(line);
};

export class Logger {
  private readonly debugEnabled: boolean;
  private readonly scope?: string;
  private readonly sink: LogSink;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled = options.debugEnabled ?? false;
    this.scope = options.scope;
    this.sink = options.sink ?? stdoutSink;
    this.now = options.now ?? (() => new Date());
  }

  child(scope: string): Logger {
    return new Logger({
      debugEnabled: this.debugEnabled,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      sink: this.sink,
      now: this.now,
    });
  }

  debug(message: string): void {
    if (!this.debugEnabled) {
      return;
    }
    this.print("debug", message);
  }

  info(message: string): void {
    this.print("info", message);
  }

  warn(message: string): void {
    this.print("warn", message);
  }

  error(message: string): void {
    this.print("error", message);
  }

  private print(level: Level, message: string): void {
    const ts = this.now().toISOString();
    const scope = this.scope ? ` [${this.scope}]` : "";
    // Unified, grep-friendly log format.
    this.sink(`[${ts}] [${level.toUpperCase()}]${scope} ${message}\n`);
  }
}
