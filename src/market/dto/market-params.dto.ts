import { IsIn, IsNotEmpty, IsString, ValidateIf } from 'class-validator';
import { SCALES } from '../../common/scale/time-bucket';

export class SymbolParamsDto {
  @IsString()
  @IsNotEmpty()
  symbol!: string;
}

export class AllExchangesChartPointsParamsDto {
  @IsString()
  @IsNotEmpty()
  filter!: string;

  @IsString()
  @IsNotEmpty()
  symbol!: string;
}

export class ChartPointsParamsDto extends AllExchangesChartPointsParamsDto {
  // Empty is allowed and means every exchange
  @IsString()
  exchange!: string;
}

export class ScaleQueryDto {
  @ValidateIf((query: ScaleQueryDto) => query.scale !== undefined && query.scale !== '')
  @IsIn(SCALES)
  scale?: string;
}
