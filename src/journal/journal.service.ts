import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { format } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import { TradeRecord } from './entities/trade-record.entity';
import { CreateTradeDto } from './dto/create-trade.dto';
import { UpdateTradeDto } from './dto/update-trade.dto';
import { TRADE_REPOSITORY, TradeRepository } from './trade-repository.interface';
import { ImageStorageService, UploadedImage } from './image-storage.service';
import { computeNetPnL } from '../pnl/pnl-calculator';
import { defaultCosts } from '../pnl/cost-defaults';

type TradeFields = Omit<TradeRecord, 'id' | 'pnl' | 'timestamp'>;

// Trade mutations. Every save recomputes pnl from the record's own fields,
// and a record exclusively owns its screenshot file.
@Injectable()
export class JournalService {
  private readonly logger = new Logger(JournalService.name);

  constructor(
    @Inject(TRADE_REPOSITORY) private readonly repository: TradeRepository,
    private readonly images: ImageStorageService,
  ) {}

  /**
   * Logs a new trade with a fresh id.
   * Omitted costs default to the per-contract rates for the given contracts.
   */
  async createTrade(dto: CreateTradeDto): Promise<TradeRecord> {
    const costs = defaultCosts(dto.contracts);

    const record = this.withPnl(uuidv4(), {
      date: dto.date ?? format(new Date(), 'yyyy-MM-dd'),
      instrument: dto.instrument,
      direction: dto.direction,
      contracts: dto.contracts,
      entry: dto.entry,
      exit: dto.exit,
      commissions: dto.commissions ?? costs.commissions,
      fees: dto.fees ?? costs.fees,
      setup: dto.setup ?? '',
      notes: dto.notes ?? '',
      tradeImagePath: null,
    });

    await this.repository.upsert(record);
    this.logger.log(`Logged trade ${record.id} (${record.instrument} ${record.direction}, pnl ${record.pnl})`);
    return record;
  }

  /**
   * Applies an edit in place. Omitted fields, costs included, keep their
   * stored values.
   * @throws NotFoundException for an unknown id
   */
  async updateTrade(id: string, dto: UpdateTradeDto): Promise<TradeRecord> {
    const existing = await this.requireTrade(id);

    const record = this.withPnl(id, {
      date: dto.date ?? existing.date,
      instrument: dto.instrument ?? existing.instrument,
      direction: dto.direction ?? existing.direction,
      contracts: dto.contracts ?? existing.contracts,
      entry: dto.entry ?? existing.entry,
      exit: dto.exit ?? existing.exit,
      commissions: dto.commissions ?? existing.commissions,
      fees: dto.fees ?? existing.fees,
      setup: dto.setup ?? existing.setup,
      notes: dto.notes ?? existing.notes,
      tradeImagePath: existing.tradeImagePath,
    });

    await this.repository.upsert(record);
    this.logger.log(`Updated trade ${id} (pnl ${record.pnl})`);
    return record;
  }

  /**
   * Removes the record, then frees the screenshot it owned.
   * @throws NotFoundException for an unknown id
   */
  async deleteTrade(id: string): Promise<TradeRecord> {
    const removed = await this.repository.delete(id);
    if (!removed) {
      throw new NotFoundException(`Trade ${id} not found`);
    }

    if (removed.tradeImagePath) {
      await this.images.remove(removed.tradeImagePath);
    }

    this.logger.log(`Deleted trade ${id}`);
    return removed;
  }

  /**
   * Stores a new screenshot for the trade and frees the one it replaces.
   * If the record cannot be saved the new file is freed again.
   * @throws NotFoundException for an unknown id
   */
  async attachImage(id: string, upload: UploadedImage): Promise<TradeRecord> {
    const existing = await this.requireTrade(id);
    const previousPath = existing.tradeImagePath;
    const newPath = await this.images.save(upload);

    const record: TradeRecord = {
      ...existing,
      tradeImagePath: newPath,
      timestamp: new Date().toISOString(),
    };

    try {
      await this.repository.upsert(record);
    } catch (error) {
      await this.images.remove(newPath);
      throw error;
    }

    if (previousPath && previousPath !== newPath) {
      await this.images.remove(previousPath);
    }
    return record;
  }

  /**
   * Detaches and frees the trade's screenshot. No-op without one.
   * @throws NotFoundException for an unknown id
   */
  async removeImage(id: string): Promise<TradeRecord> {
    const existing = await this.requireTrade(id);
    if (!existing.tradeImagePath) {
      return existing;
    }

    const record: TradeRecord = {
      ...existing,
      tradeImagePath: null,
      timestamp: new Date().toISOString(),
    };
    await this.repository.upsert(record);
    await this.images.remove(existing.tradeImagePath);
    return record;
  }

  private async requireTrade(id: string): Promise<TradeRecord> {
    const record = await this.repository.findById(id);
    if (!record) {
      throw new NotFoundException(`Trade ${id} not found`);
    }
    return record;
  }

  private withPnl(id: string, fields: TradeFields): TradeRecord {
    return {
      id,
      ...fields,
      pnl: computeNetPnL(
        fields.entry,
        fields.exit,
        fields.instrument,
        fields.direction,
        fields.contracts,
        fields.commissions,
        fields.fees,
      ),
      timestamp: new Date().toISOString(),
    };
  }
}
