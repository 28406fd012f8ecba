import { ArgumentMetadata } from '@nestjs/common';
import { createValidationPipe } from './validation.pipe';
import { ErrorKind } from '../errors';
import { ChartPointsParamsDto, ScaleQueryDto, SymbolParamsDto } from '../../market/dto/market-params.dto';
import { TokenSymbolParamsDto } from '../../tokens/dto/token-symbol-params.dto';

describe('createValidationPipe', () => {
  const pipe = createValidationPipe();
  const param = (metatype: ArgumentMetadata['metatype']): ArgumentMetadata => ({ type: 'param', metatype });
  const query = (metatype: ArgumentMetadata['metatype']): ArgumentMetadata => ({ type: 'query', metatype });

  it('should parse symbol params into the dto', async () => {
    const parsed = await pipe.transform({ symbol: 'BTC' }, param(SymbolParamsDto));

    expect(parsed).toBeInstanceOf(SymbolParamsDto);
    expect(parsed).toEqual({ symbol: 'BTC' });
  });

  it('should reject an empty symbol as a validation error', async () => {
    await expect(pipe.transform({ symbol: '' }, param(SymbolParamsDto))).rejects.toMatchObject({
      kind: ErrorKind.Validation,
      message: 'symbol should not be empty',
    });
  });

  it('should reject an empty token symbol', async () => {
    await expect(pipe.transform({ tokenSymbol: '' }, param(TokenSymbolParamsDto))).rejects.toMatchObject({
      kind: ErrorKind.Validation,
      message: 'tokenSymbol should not be empty',
    });
  });

  it('should accept chart params with an exchange', async () => {
    const parsed = await pipe.transform({ filter: 'VWAP', exchange: 'Binance', symbol: 'ETH' }, param(ChartPointsParamsDto));

    expect(parsed).toEqual({ filter: 'VWAP', exchange: 'Binance', symbol: 'ETH' });
  });

  it('should accept an omitted or empty scale', async () => {
    await expect(pipe.transform({}, query(ScaleQueryDto))).resolves.toEqual({});
    await expect(pipe.transform({ scale: '' }, query(ScaleQueryDto))).resolves.toEqual({ scale: '' });
  });

  it('should reject a scale outside the enumeration', async () => {
    await expect(pipe.transform({ scale: '2h' }, query(ScaleQueryDto))).rejects.toMatchObject({
      kind: ErrorKind.Validation,
      message: expect.stringContaining('scale must be one of the following values'),
    });
  });

  it('should strip unknown query parameters', async () => {
    await expect(pipe.transform({ scale: '1d', limit: '10' }, query(ScaleQueryDto))).resolves.toEqual({ scale: '1d' });
  });
});
