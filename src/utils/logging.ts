import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { loggingConfig } from '../connections/config/app.config';

type LogSettings = typeof loggingConfig;

class LoggingSetup {
  private readonly logDir: string;

  constructor(private readonly settings: LogSettings) {
    this.logDir = path.resolve(settings.dir);

    if (settings.toFile && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackPrefix: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const stackStr = typeof stack === 'string' ? `\n${stackPrefix}${stack}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.colorize({ all: true }),
      winston.format.printf(info => this.formatLine(info, ''))
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(info => this.formatLine(info, 'Stack: '))
    );
  }

  private rotatingFile(name: string, level?: string): DailyRotateFile {
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${name}-%DATE%.log`),
      datePattern: 'YYYY-MM-DD',
      maxSize: this.settings.rotation,
      maxFiles: this.settings.retention,
      zippedArchive: this.settings.compression,
      format: this.createFileFormat(),
      ...(level && { level }),
    });
  }

  setupLogging(): winston.Logger {
    const logger = winston.createLogger({
      level: this.settings.level,
      format: this.createFileFormat(),
      silent: this.settings.silent,
      transports: [],
      exitOnError: false,
    });

    logger.add(new winston.transports.Console({
      level: this.settings.level,
      format: this.createConsoleFormat(),
    }));

    if (this.settings.toFile) {
      logger.add(this.rotatingFile('sys'));
      logger.add(this.rotatingFile('error', 'error'));
      // combined keeps every level, including http request lines
      logger.add(this.rotatingFile('combined', 'silly'));
    }

    return logger;
  }
}

export const logger = new LoggingSetup(loggingConfig).setupLogging();

export const getLogger = (name: string): winston.Logger => logger.child({ name });
