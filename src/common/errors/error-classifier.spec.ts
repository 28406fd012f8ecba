import { BadRequestException, HttpStatus, NotFoundException, ServiceUnavailableException } from '@nestjs/common';
import { INTERNAL_ERROR_MESSAGE, classify, statusFor } from './error-classifier';
import { ErrorKind, GatewayError } from './gateway-error';

describe('classify', () => {
  it('should keep the kind of a gateway error', () => {
    const error = GatewayError.notFound('Quotation for XYZ not found');

    expect(classify(error)).toBe(error);
  });

  it('should treat a 404 http exception as not found', () => {
    expect(classify(new NotFoundException('Cannot GET /v1/nothing'))).toMatchObject({
      kind: ErrorKind.NotFound,
      message: 'Cannot GET /v1/nothing',
    });
  });

  it('should treat a 400 http exception as a validation error', () => {
    expect(classify(new BadRequestException('Unexpected token } in JSON')).kind).toBe(ErrorKind.Validation);
  });

  it('should treat other http exceptions as internal', () => {
    expect(classify(new ServiceUnavailableException()).kind).toBe(ErrorKind.Internal);
  });

  it('should hide the message of an unknown error', () => {
    const cause = new Error('ERR wrong number of arguments for command');
    const classified = classify(cause);

    expect(classified).toMatchObject({ kind: ErrorKind.Internal, message: INTERNAL_ERROR_MESSAGE });
    expect(classified.cause).toBe(cause);
  });

  it('should classify values that are not errors', () => {
    expect(classify('timeout').kind).toBe(ErrorKind.Internal);
    expect(classify(undefined).kind).toBe(ErrorKind.Internal);
  });

  it('should classify by identity, never by message', () => {
    expect(classify(new Error('not found')).kind).toBe(ErrorKind.Internal);
  });
});

describe('statusFor', () => {
  it('should map each kind to its status', () => {
    expect(statusFor(ErrorKind.NotFound)).toBe(HttpStatus.NOT_FOUND);
    expect(statusFor(ErrorKind.Internal)).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
    expect(statusFor(ErrorKind.Validation)).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
  });
});
