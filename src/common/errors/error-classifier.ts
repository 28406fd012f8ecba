import { HttpException, HttpStatus } from '@nestjs/common';
import { ErrorKind, GatewayError } from './gateway-error';

export const INTERNAL_ERROR_MESSAGE = 'internal error';

/**
 * Maps any failure to a gateway error kind. Only the error's type is
 * inspected, never its message.
 */
export function classify(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }

  if (error instanceof HttpException) {
    const status = error.getStatus();
    if (status === HttpStatus.NOT_FOUND) {
      return new GatewayError(ErrorKind.NotFound, error.message, error);
    }
    if (status === HttpStatus.BAD_REQUEST) {
      return new GatewayError(ErrorKind.Validation, error.message, error);
    }
  }

  return GatewayError.internal(INTERNAL_ERROR_MESSAGE, error);
}

export function statusFor(kind: ErrorKind): HttpStatus {
  switch (kind) {
    case ErrorKind.NotFound:
      return HttpStatus.NOT_FOUND;
    case ErrorKind.Validation:
      // Validation failures keep the 500 of the public contract
      return HttpStatus.INTERNAL_SERVER_ERROR;
    case ErrorKind.Internal:
      return HttpStatus.INTERNAL_SERVER_ERROR;
  }
}
