import { ArgumentsHost, Catch, ExceptionFilter } from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorKind, GatewayError, classify, statusFor } from '../errors';
import { LoggerService } from '../../logger/logger.service';
import { REQUEST_ID_HEADER } from '../../logger/request-id.middleware';

export interface ErrorBody {
  code: ErrorKind;
  message: string;
}

export function toErrorBody(error: GatewayError): ErrorBody {
  return { code: error.kind, message: error.message };
}

/**
 * Writes every failure as `{ code, message }`. Causes and stacks are
 * logged, never sent.
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: LoggerService) {
    this.logger.setContext('ApiExceptionFilter');
  }

  catch(exception: unknown, host: ArgumentsHost) {
    const http = host.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const error = classify(exception);
    const status = statusFor(error.kind);
    const meta = {
      requestId: request.headers[REQUEST_ID_HEADER],
      method: request.method,
      path: request.url,
      status,
    };

    if (error.kind === ErrorKind.Internal) {
      const cause = error.cause instanceof Error ? error.cause : error;
      this.logger.error(`Request failed: ${error.message}`, cause.stack, { ...meta, cause: cause.message });
    } else {
      this.logger.warn(`Request rejected: ${error.message}`, meta);
    }

    response.status(status).json(toErrorBody(error));
  }
}
