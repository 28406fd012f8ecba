import { IsNotEmpty, IsString } from 'class-validator';

export class TokenSymbolParamsDto {
  @IsString()
  @IsNotEmpty()
  tokenSymbol!: string;
}
