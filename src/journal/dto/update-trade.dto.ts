import { IsEnum, IsInt, IsNotEmpty, IsNumber, IsOptional, IsString, Min } from 'class-validator';
import { Direction } from '../entities/trade-record.entity';
import { IsTradeDate } from './is-trade-date.decorator';

// Edit-submit: omitted fields keep their stored values, pnl is recomputed.
export class UpdateTradeDto {
  @IsOptional()
  @IsTradeDate()
  date?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  instrument?: string;

  @IsOptional()
  @IsEnum(Direction)
  direction?: Direction;

  @IsOptional()
  @IsInt()
  @Min(1)
  contracts?: number;

  @IsOptional()
  @IsString()
  entry?: string;

  @IsOptional()
  @IsString()
  exit?: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  commissions?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  fees?: number;

  @IsOptional()
  @IsString()
  setup?: string;

  @IsOptional()
  @IsString()
  notes?: string;
}
