import {
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';
import { Direction } from '../entities/trade-record.entity';
import { IsTradeDate } from './is-trade-date.decorator';

// Fields of the trade form. entry/exit stay raw text: a price that does not
// parse is stored as typed and yields a pnl of 0.
export class CreateTradeDto {
  @IsOptional()
  @IsTradeDate()
  date?: string;

  // Any name is accepted; unknown instruments price at $1 per point
  @IsString()
  @IsNotEmpty()
  instrument!: string;

  @IsEnum(Direction)
  direction!: Direction;

  @IsInt()
  @Min(1)
  contracts!: number;

  @IsString()
  entry!: string;

  @IsString()
  exit!: string;

  // Omitted costs default to the per-contract rates
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
