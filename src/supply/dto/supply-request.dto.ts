import { IsNotEmpty, IsNumber, IsOptional, IsString, NotEquals } from 'class-validator';

export class SupplyRequestDto {
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @NotEquals(0)
  circulatingSupply!: number;

  @IsOptional()
  @IsString()
  source?: string; // empty means the platform default
}
