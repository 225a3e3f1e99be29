import { createLogger, format, transports } from 'winston';
import type { Format, TransformableInfo } from 'logform';
import DailyRotateFile from 'winston-daily-rotate-file';
import type TransportStream from 'winston-transport';
import type { Logger, LoggerFactory } from 'global-logger-factory';
import { WinstonLogger } from 'global-logger-factory';
import { logContext } from './LogContext';

interface ConfigurableLoggerOptions {
  /** 日志文件模式（支持 %DATE%），不设置时只输出到控制台 */
  fileName?: string;
  maxSize?: string;
  maxFiles?: string;
  /** 测试中关闭所有输出 */
  silent?: boolean;
}

export class ConfigurableLoggerFactory implements LoggerFactory {
  private readonly level: string;
  private readonly silent: boolean;
  private readonly fileTransport?: DailyRotateFile;

  public constructor(level: string, options: ConfigurableLoggerOptions = {}) {
    this.level = level;
    this.silent = options.silent ?? false;
    if (options.fileName) {
      this.fileTransport = new DailyRotateFile({
        filename: options.fileName,
        datePattern: 'YYYY-MM-DD',
        maxSize: options.maxSize ?? '10m',
        maxFiles: options.maxFiles ?? '14d',
      });
      // Prevent MaxListenersExceededWarning as this transport is shared across all loggers
      this.fileTransport.setMaxListeners(Infinity);
    }
  }

  public createLogger(label: string): Logger {
    return new WinstonLogger(createLogger({
      level: this.level,
      silent: this.silent,
      format: this.getFormat(label),
      transports: this.createTransports(label),
    }));
  }

  protected createTransports(label: string): TransportStream[] {
    const consoleTransport = new transports.Console({
      format: format.combine(
        format.colorize(),
        this.getFormat(label),
      ),
    });
    return this.fileTransport ? [ consoleTransport, this.fileTransport ] : [ consoleTransport ];
  }

  protected getFormat(label: string): Format {
    return format.combine(
      format.label({ label }),
      format.timestamp(),
      format((info) => {
        const store = logContext.getStore();
        if (store?.runId) {
          info.runId = store.runId;
        }
        return info;
      })(),
      format.printf(({ level, message, label: labelInner, timestamp, runId }: TransformableInfo): string => {
        const runInfo = typeof runId === 'string' ? ` [Run:${runId}]` : '';
        const displayLabel = typeof labelInner === 'string' ? labelInner.split('/').pop() : label;
        return `${String(timestamp)}${runInfo} [${displayLabel ?? label}] ${level}: ${String(message)}`;
      }),
    );
  }
}
