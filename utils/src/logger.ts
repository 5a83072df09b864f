import winston from 'winston';
import chalk from 'chalk';

const { combine, timestamp, printf, colorize } = winston.format;

// Custom format for console output
const consoleFormat = printf(({ level, message, timestamp, ...meta }) => {
  const ts = typeof timestamp === 'string' ? timestamp.slice(11, 19) : '';
  let output = `${chalk.gray(ts)} ${level}: ${String(message)}`;

  if (Object.keys(meta).length > 0) {
    output += `\n${chalk.gray(JSON.stringify(meta, null, 2))}`;
  }

  return output;
});

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  level?: string;
  logFile?: string;
}

export class Logger {
  private winston: winston.Logger;
  private fileTransport?: winston.transport;

  constructor(options?: LoggerOptions) {
    this.winston = winston.createLogger({
      level: options?.level || process.env.LOG_LEVEL || 'info',
      format: combine(
        timestamp(),
        winston.format.errors({ stack: true }),
      ),
      transports: [
        // stdout belongs to command output
        new winston.transports.Console({
          stderrLevels: ['error', 'warn', 'info', 'debug'],
          format: combine(
            colorize({ all: true }),
            consoleFormat
          ),
        }),
      ],
    });

    if (options?.logFile) {
      this.setLogFile(options.logFile);
    }
  }

  setLevel(level: string) {
    this.winston.level = level;
  }

  getLevel(): string {
    return this.winston.level;
  }

  setLogFile(filename: string) {
    if (this.fileTransport) {
      this.winston.remove(this.fileTransport);
    }
    this.fileTransport = new winston.transports.File({
      filename,
      format: combine(
        timestamp(),
        winston.format.json()
      ),
    });
    this.winston.add(this.fileTransport);
  }

  debug(message: string, meta?: LogMeta) {
    this.winston.debug(message, meta);
  }

  info(message: string, meta?: LogMeta) {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta) {
    if (error instanceof Error) {
      this.winston.error(message, {
        error: error.message,
        stack: error.stack,
        ...meta,
      });
    } else if (error !== undefined) {
      this.winston.error(message, { error, ...meta });
    } else {
      this.winston.error(message, meta);
    }
  }

  success(message: string, meta?: LogMeta) {
    this.winston.info(chalk.green(message), meta);
  }
}

// Default logger instance
export const logger = new Logger();
