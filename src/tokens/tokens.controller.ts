import { Controller, Get, Param } from '@nestjs/common';
import { TokenSymbolParamsDto } from './dto/token-symbol-params.dto';
import { CountedResult, TokensService } from './tokens.service';
import { SecurityToken, SecurityTokenSymbol } from '../entities/security-token.entity';

@Controller('v1/securityTokens')
export class TokensController {
  constructor(private tokensService: TokensService) {}

  @Get()
  getAllTokens(): Promise<CountedResult<SecurityTokenSymbol[]>> {
    return this.tokensService.getAllTokenSymbols();
  }

  @Get(':tokenSymbol')
  getTokenDetails(@Param() params: TokenSymbolParamsDto): Promise<CountedResult<SecurityToken | null>> {
    return this.tokensService.getTokenDetails(params.tokenSymbol);
  }
}
