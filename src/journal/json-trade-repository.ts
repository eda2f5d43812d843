import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { TradeRecord } from './entities/trade-record.entity';
import { TradeRepository } from './trade-repository.interface';
import { JOURNAL_CONFIG, JournalConfig } from '../config/journal.config';

// Flat JSON file store: every read loads the whole file, every write rewrites it.
// No locking - one writer process at a time.
@Injectable()
export class JsonTradeRepository implements TradeRepository {
  private readonly logger = new Logger(JsonTradeRepository.name);

  constructor(@Inject(JOURNAL_CONFIG) private readonly config: JournalConfig) {}

  /** Entries without a string id are skipped here but kept on disk */
  async list(): Promise<TradeRecord[]> {
    const entries = await this.load();
    const records = entries.filter(isTradeRecord);
    if (records.length < entries.length) {
      this.logger.warn(
        `Skipped ${entries.length - records.length} unrecognized entries in ${this.config.dataFile}`,
      );
    }
    return records;
  }

  async findById(id: string): Promise<TradeRecord | undefined> {
    const entries = await this.load();
    return entries.filter(isTradeRecord).find((record) => record.id === id);
  }

  async upsert(record: TradeRecord): Promise<TradeRecord> {
    const entries = await this.load();
    const index = entries.findIndex((entry) => isTradeRecord(entry) && entry.id === record.id);

    if (index === -1) {
      entries.push(record);
    } else {
      entries[index] = record;
    }

    await this.save(entries);
    return record;
  }

  async delete(id: string): Promise<TradeRecord | undefined> {
    const entries = await this.load();
    const index = entries.findIndex((entry) => isTradeRecord(entry) && entry.id === id);
    const removed = entries[index];
    if (index === -1 || !isTradeRecord(removed)) {
      return undefined;
    }

    entries.splice(index, 1);
    await this.save(entries);
    return removed;
  }

  /**
   * Every entry in the file, recognized or not, so writes carry them all back.
   * Missing file means an empty journal. A corrupted or non-array
   * document is also read as empty; other I/O errors propagate.
   */
  private async load(): Promise<unknown[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.config.dataFile, 'utf8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    if (raw.trim() === '') {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn(`Journal file ${this.config.dataFile} is not valid JSON, starting empty`);
      return [];
    }

    if (!Array.isArray(parsed)) {
      this.logger.warn(`Journal file ${this.config.dataFile} does not hold a list, starting empty`);
      return [];
    }
    return parsed;
  }

  private async save(entries: unknown[]): Promise<void> {
    await fs.mkdir(path.dirname(this.config.dataFile), { recursive: true });
    await fs.writeFile(this.config.dataFile, JSON.stringify(entries, null, 4), 'utf8');
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function isTradeRecord(value: unknown): value is TradeRecord {
  return typeof value === 'object' && value !== null && 'id' in value && typeof value.id === 'string';
}
