import { IsEnum, IsInt, IsNotEmpty, IsNumber, IsOptional, IsString, Min } from 'class-validator';
import { Direction } from '../entities/trade-record.entity';

// Unsaved form values for a live P&L preview
export class PnlPreviewDto {
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

  @IsOptional()
  @IsNumber()
  @Min(0)
  commissions?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  fees?: number;
}

export interface PnlPreviewResponseDto {
  pnl: number;
  commissions: number;   // costs the preview was computed with
  fees: number;
}
