import { TradeRecord } from './entities/trade-record.entity';

export const TRADE_REPOSITORY = Symbol('TRADE_REPOSITORY');

// Persistence capability handed to the journal services.
// Implementations keep records in insertion order.
export interface TradeRepository {
  list(): Promise<TradeRecord[]>;
  findById(id: string): Promise<TradeRecord | undefined>;
  /** Replaces the record with the same id in place, or appends it */
  upsert(record: TradeRecord): Promise<TradeRecord>;
  /** Returns the removed record, undefined if the id was unknown */
  delete(id: string): Promise<TradeRecord | undefined>;
}
