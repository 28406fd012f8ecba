import { ValidationError, ValidationPipe } from '@nestjs/common';
import { GatewayError } from '../errors';

function firstConstraint(errors: ValidationError[]): string | undefined {
  for (const error of errors) {
    const messages = Object.values(error.constraints ?? {});
    if (messages.length > 0) {
      return messages[0];
    }
    const nested = firstConstraint(error.children ?? []);
    if (nested) {
      return nested;
    }
  }
  return undefined;
}

/**
 * Parses request DTOs once at the boundary; failures become gateway
 * validation errors.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
    exceptionFactory: (errors: ValidationError[]) =>
      GatewayError.validation(firstConstraint(errors) ?? 'invalid request parameters'),
  });
}
