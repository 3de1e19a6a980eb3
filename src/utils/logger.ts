import chalk from 'chalk';

export enum LogLevel { DEBUG = 0, INFO = 1, WARN = 2, ERROR = 3 }

/**
 * Where debug, info and success messages go. Warnings and errors always
 * use stderr; `stderr` keeps stdout free for machine-readable reports.
 */
export type LogOutput = 'stdout' | 'stderr';

export class Logger {
  // Progress chatter stays hidden unless --verbose is passed
  private level: LogLevel = LogLevel.WARN;
  private output: LogOutput = 'stdout';

  setLevel(level: LogLevel): void { this.level = level; }

  getLevel(): LogLevel { return this.level; }

  setOutput(output: LogOutput): void { this.output = output; }

  getOutput(): LogOutput { return this.output; }

  debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      this.print(chalk.gray(`[DEBUG] ${message}`), args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      this.print(chalk.blue(`[INFO] ${message}`), args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      console.warn(chalk.yellow(`[WARN] ${message}`), ...args);
    }
  }

  // Not filtered by level
  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`[ERROR] ${message}`), ...args);
  }

  success(message: string, ...args: unknown[]): void {
    this.print(chalk.green(`[SUCCESS] ${message}`), args);
  }

  private print(line: string, args: unknown[]): void {
    if (this.output === 'stderr') {
      console.error(line, ...args);
    } else {
      console.log(line, ...args);
    }
  }
}

export const logger = new Logger();
