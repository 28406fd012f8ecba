import { ArgumentsHost, NotFoundException } from '@nestjs/common';
import { ApiExceptionFilter } from './api-exception.filter';
import { GatewayError } from '../errors';
import { LoggerService } from '../../logger/logger.service';

describe('ApiExceptionFilter', () => {
  let filter: ApiExceptionFilter;
  let logger: { setContext: jest.Mock; log: jest.Mock; error: jest.Mock; warn: jest.Mock; debug: jest.Mock };
  let response: { status: jest.Mock; json: jest.Mock };
  let host: ArgumentsHost;

  beforeEach(() => {
    logger = {
      setContext: jest.fn(),
      log: jest.fn(),
      error: jest.fn(),
      warn: jest.fn(),
      debug: jest.fn(),
    };
    response = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn(),
    };
    const request = {
      method: 'GET',
      url: '/v1/quotation/XYZ',
      headers: { 'x-request-id': 'req-1' },
    };
    host = {
      switchToHttp: () => ({
        getRequest: () => request,
        getResponse: () => response,
      }),
    } as unknown as ArgumentsHost;

    filter = new ApiExceptionFilter(logger as unknown as LoggerService);
  });

  it('should answer 404 for an absent entity', () => {
    filter.catch(GatewayError.notFound('Quotation for XYZ not found'), host);

    expect(response.status).toHaveBeenCalledWith(404);
    expect(response.json).toHaveBeenCalledWith({ code: 'NOT_FOUND', message: 'Quotation for XYZ not found' });
    expect(logger.warn).toHaveBeenCalledWith('Request rejected: Quotation for XYZ not found', {
      requestId: 'req-1',
      method: 'GET',
      path: '/v1/quotation/XYZ',
      status: 404,
    });
  });

  it('should answer 500 for a validation error', () => {
    filter.catch(GatewayError.validation('Missing Symbol or CirculatingSupply value'), host);

    expect(response.status).toHaveBeenCalledWith(500);
    expect(response.json).toHaveBeenCalledWith({
      code: 'VALIDATION_ERROR',
      message: 'Missing Symbol or CirculatingSupply value',
    });
  });

  it('should keep the message of a gateway internal error', () => {
    filter.catch(GatewayError.internal('cant find symbols'), host);

    expect(response.status).toHaveBeenCalledWith(500);
    expect(response.json).toHaveBeenCalledWith({ code: 'INTERNAL_ERROR', message: 'cant find symbols' });
  });

  it('should log but not expose the details of a backend failure', () => {
    const failure = new Error('connect ECONNREFUSED 10.0.0.5:6379');

    filter.catch(failure, host);

    expect(response.status).toHaveBeenCalledWith(500);
    expect(response.json).toHaveBeenCalledWith({ code: 'INTERNAL_ERROR', message: 'internal error' });
    expect(logger.error).toHaveBeenCalledWith('Request failed: internal error', failure.stack, {
      requestId: 'req-1',
      method: 'GET',
      path: '/v1/quotation/XYZ',
      status: 500,
      cause: 'connect ECONNREFUSED 10.0.0.5:6379',
    });
  });

  it('should answer 404 for an unknown route', () => {
    filter.catch(new NotFoundException('Cannot GET /v1/nothing'), host);

    expect(response.status).toHaveBeenCalledWith(404);
    expect(response.json).toHaveBeenCalledWith({ code: 'NOT_FOUND', message: 'Cannot GET /v1/nothing' });
  });
});
