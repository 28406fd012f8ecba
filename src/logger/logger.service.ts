import { Injectable, LoggerService as NestLoggerService, Scope } from '@nestjs/common';
import * as winston from 'winston';

export type LogContext = Record<string, unknown>;

let rootLogger: winston.Logger | undefined;

/**
 * The one winston logger of the process. Exception and rejection handlers
 * attach to `process` when it is created, so it is created once and shared.
 */
function getRootLogger(): winston.Logger {
  if (rootLogger) {
    return rootLogger;
  }
  const isDevelopment = process.env.NODE_ENV === 'development';

  rootLogger = winston.createLogger({
    level: process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info'),
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      isDevelopment ? winston.format.colorize() : winston.format.uncolorize(),
      winston.format.printf((info) => {
        const { timestamp, level, message, context, requestId, stack, ...metadata } = info;
        if (isDevelopment) {
          const ctx = context ? `[${String(context)}]` : '';
          const rid = requestId ? `[${String(requestId)}]` : '';
          const meta = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
          return `${String(timestamp)} ${level} ${ctx}${rid} ${String(message)}${meta}${stack ? '\n' + String(stack) : ''}`;
        }
        return JSON.stringify({
          timestamp,
          level,
          context,
          requestId,
          message,
          ...metadata,
          ...(stack ? { stack } : {}),
        });
      }),
    ),
    transports: [
      new winston.transports.Console({
        handleExceptions: true,
        handleRejections: true,
      }),
    ],
  });
  return rootLogger;
}

/**
 * Transient scope gives every consumer its own instance, so `setContext` in
 * one service never relabels another's lines. All instances write through the
 * shared root logger.
 */
@Injectable({ scope: Scope.TRANSIENT })
export class LoggerService implements NestLoggerService {
  private readonly logger = getRootLogger();
  private context?: string;

  setContext(context: string) {
    this.context = context;
  }

  log(message: string, context?: string | LogContext, metadata?: LogContext) {
    this.logger.info(message, this.meta(context, metadata));
  }

  error(message: string, trace?: string, context?: string | LogContext, metadata?: LogContext) {
    this.logger.error(message, { ...this.meta(context, metadata), stack: trace });
  }

  warn(message: string, context?: string | LogContext, metadata?: LogContext) {
    this.logger.warn(message, this.meta(context, metadata));
  }

  debug(message: string, context?: string | LogContext, metadata?: LogContext) {
    this.logger.debug(message, this.meta(context, metadata));
  }

  verbose(message: string, context?: string | LogContext, metadata?: LogContext) {
    this.logger.verbose(message, this.meta(context, metadata));
  }

  private meta(context?: string | LogContext, metadata?: LogContext): LogContext {
    const ctx = typeof context === 'string' ? context : this.context;
    const meta = typeof context === 'object' ? context : metadata;
    return { context: ctx, ...meta };
  }
}
