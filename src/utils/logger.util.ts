import chalk from "chalk";

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string, err?: Error) => void;
  debug: (msg: string) => void;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const isLogLevel = (value: string): value is LogLevel =>
  Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);

export const resolveLogLevel = (
  env: NodeJS.ProcessEnv = process.env,
): LogLevel => {
  if (env.DEBUG === "1") return "debug";
  const raw = (env.LOG_LEVEL ?? env.log_level ?? "").toLowerCase();
  if (raw === "trace") return "debug";
  return isLogLevel(raw) ? raw : "info";
};

export class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(level: LogLevel = resolveLogLevel()) {
    this.threshold = LEVEL_ORDER[level];
  }

  info(msg: string): void {
    if (!this.enabled("info")) return;
    console.log(chalk.cyan("[INFO]"), msg);
  }

  warn(msg: string): void {
    if (!this.enabled("warn")) return;
    console.warn(chalk.yellow("[WARN]"), msg);
  }

  error(msg: string, err?: Error): void {
    if (!this.enabled("error")) return;
    console.error(
      chalk.red("[ERROR]"),
      msg,
      err ? `\n${err.stack ?? err.message}` : "",
    );
  }

  debug(msg: string): void {
    if (!this.enabled("debug")) return;
    console.debug(chalk.gray("[DEBUG]"), msg);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }
}
