export enum ErrorKind {
  NotFound = 'NOT_FOUND',
  Internal = 'INTERNAL_ERROR',
  Validation = 'VALIDATION_ERROR',
}

/**
 * Error raised by the gateway itself. The message is safe to return to
 * callers; anything diagnostic belongs in `cause` and stays in the logs.
 */
export class GatewayError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'GatewayError';
  }

  static notFound(message: string): GatewayError {
    return new GatewayError(ErrorKind.NotFound, message);
  }

  static internal(message: string, cause?: unknown): GatewayError {
    return new GatewayError(ErrorKind.Internal, message, cause);
  }

  static validation(message: string, cause?: unknown): GatewayError {
    return new GatewayError(ErrorKind.Validation, message, cause);
  }
}
