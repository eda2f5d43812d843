import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { isValid, parseISO } from 'date-fns';
import { TradeRecord } from './entities/trade-record.entity';
import { TRADE_REPOSITORY, TradeRepository } from './trade-repository.interface';
import { PnlPreviewDto, PnlPreviewResponseDto } from './dto/pnl-preview.dto';
import { CostDefaultsResponseDto, TradeOutcome, TradeResponseDto } from './dto/trade-response.dto';
import { computeNetPnL } from '../pnl/pnl-calculator';
import { costPerContract, defaultCosts } from '../pnl/cost-defaults';
import { formatSignedUSD, toCents, toDecimal } from '../common/utils/decimal.util';

const EPOCH = parseISO('1970-01-01');

// Read-only operations for journal data.
// Queries separated from mutations (JournalService).
@Injectable()
export class JournalQueryService {
  constructor(@Inject(TRADE_REPOSITORY) private readonly repository: TradeRepository) {}

  /**
   * Journal history, most recent date first.
   * Same-day trades keep their stored order; records without a usable
   * date sort as 1970-01-01.
   */
  async listTrades(): Promise<TradeResponseDto[]> {
    const records = await this.repository.list();
    return records
      .map((record) => ({ record, time: tradeTime(record).getTime() }))
      .sort((a, b) => b.time - a.time)
      .map(({ record }) => toResponse(record));
  }

  /** @throws NotFoundException for an unknown id */
  async getTrade(id: string): Promise<TradeResponseDto> {
    const record = await this.repository.findById(id);
    if (!record) {
      throw new NotFoundException(`Trade ${id} not found`);
    }
    return toResponse(record);
  }

  /** Stored record without the display fields - used for serving images */
  async findTrade(id: string): Promise<TradeRecord | undefined> {
    return this.repository.findById(id);
  }

  /** Runs the calculator on unsaved form values */
  previewPnl(dto: PnlPreviewDto): PnlPreviewResponseDto {
    const costs = defaultCosts(dto.contracts);
    const commissions = dto.commissions ?? costs.commissions;
    const fees = dto.fees ?? costs.fees;

    return {
      pnl: computeNetPnL(dto.entry, dto.exit, dto.instrument, dto.direction, dto.contracts, commissions, fees),
      commissions,
      fees,
    };
  }

  /** Suggested costs for a new trade of the given size */
  getCostDefaults(contracts: number): CostDefaultsResponseDto {
    const costs = defaultCosts(contracts);
    return {
      contracts,
      commissions: costs.commissions,
      fees: costs.fees,
      total: toCents(toDecimal(costs.commissions).plus(costs.fees)),
      perContract: costPerContract(),
    };
  }
}

function tradeTime(record: TradeRecord): Date {
  if (typeof record.date !== 'string') {
    return EPOCH;
  }
  const parsed = parseISO(record.date);
  return isValid(parsed) ? parsed : EPOCH;
}

export function outcomeOf(pnl: number): TradeOutcome {
  if (pnl > 0) return 'win';
  if (pnl < 0) return 'loss';
  return 'flat';
}

function toResponse(record: TradeRecord): TradeResponseDto {
  const pnl = typeof record.pnl === 'number' ? record.pnl : 0;
  return {
    ...record,
    outcome: outcomeOf(pnl),
    pnlLabel: formatSignedUSD(pnl),
  };
}
