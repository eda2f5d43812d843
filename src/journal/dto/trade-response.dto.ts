import { TradeRecord } from '../entities/trade-record.entity';

export type TradeOutcome = 'win' | 'loss' | 'flat';

// Journal list/detail entry
export interface TradeResponseDto extends TradeRecord {
  outcome: TradeOutcome;
  pnlLabel: string;              // "+$1,234.50", "-$20.00", "$0.00"
}

export interface CostDefaultsResponseDto {
  contracts: number;
  commissions: number;
  fees: number;
  total: number;
  perContract: number;           // 1.90
}

export interface DeleteTradeResponseDto {
  message: string;
  id: string;
  imageRemoved: boolean;
}
