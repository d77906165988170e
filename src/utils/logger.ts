import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

function parseLevel(value: string | undefined): LogLevel {
  const upper = (value || '').toUpperCase();
  return Object.values(LogLevel).find(level => level === upper) ?? LogLevel.INFO;
}

class Logger {
  private logDir: string;
  private threshold: LogLevel;
  private writeFiles: boolean;

  constructor() {
    this.logDir = path.join(process.cwd(), 'logs');
    this.threshold = parseLevel(process.env.LOG_LEVEL);
    this.writeFiles = process.env.LOG_TO_FILE !== 'false';
    if (this.writeFiles) {
      fs.ensureDirSync(this.logDir);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.threshold];
  }

  private formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const formattedArgs = args.map(arg =>
      arg instanceof Error ? arg.message : typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
    ).join(' ');
    return `[${timestamp}] [${level}] ${message} ${formattedArgs}`.trimEnd();
  }

  private writeToFile(formatted: string): void {
    if (!this.writeFiles) return;
    const logFile = path.join(this.logDir, `${new Date().toISOString().split('T')[0]}.log`);
    fs.appendFileSync(logFile, formatted + '\n');
  }

  private emit(level: LogLevel, paint: (text: string) => string, message: string, args: unknown[]): void {
    if (!this.enabled(level)) return;
    const formatted = this.formatMessage(level, message, ...args);
    if (level === LogLevel.ERROR) {
      console.error(paint(formatted));
    } else {
      console.log(paint(formatted));
    }
    this.writeToFile(formatted);
  }

  debug(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.DEBUG, chalk.gray, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.INFO, chalk.blue, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.WARN, chalk.yellow, message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.ERROR, chalk.red, message, args);
  }
}

export const logger = new Logger();
