import chalk, { type ChalkInstance } from "chalk";

type LogLevel = "info" | "warn" | "error" | "success";

interface LevelStyle {
  label: string;
  color: ChalkInstance;
  write: (line: string, args: unknown[]) => void;
}

const LEVELS: Record<LogLevel, LevelStyle> = {
  info: { label: "INFO", color: chalk.blue, write: (line, args) => console.log(line, ...args) },
  warn: { label: "WARN", color: chalk.yellow, write: (line, args) => console.warn(line, ...args) },
  error: { label: "ERROR", color: chalk.red, write: (line, args) => console.error(line, ...args) },
  success: { label: "OK", color: chalk.green, write: (line, args) => console.log(line, ...args) }
};

export class Logger {
  private readonly prefix: string;
  private readonly name: string;

  constructor(name: string) {
    this.name = name;
    this.prefix = `[${name}]`;
  }

  child(name: string): Logger {
    return new Logger(`${this.name}:${name}`);
  }

  private log(level: LogLevel, message: string, args: unknown[]) {
    const style = LEVELS[level];
    const timestamp = new Date().toISOString();
    style.write(style.color(`${timestamp} ${this.prefix} ${style.label}: ${message}`), args);
  }

  info(message: string, ...args: unknown[]) {
    this.log("info", message, args);
  }

  warn(message: string, ...args: unknown[]) {
    this.log("warn", message, args);
  }

  error(message: string, ...args: unknown[]) {
    this.log("error", message, args);
  }

  success(message: string, ...args: unknown[]) {
    this.log("success", message, args);
  }
}

export const log = new Logger("forkstack");
