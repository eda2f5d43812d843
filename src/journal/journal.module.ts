import { Module } from '@nestjs/common';
import { JournalController } from './journal.controller';
import { JournalService } from './journal.service';
import { JournalQueryService } from './journal-query.service';
import { ImageStorageService } from './image-storage.service';
import { JsonTradeRepository } from './json-trade-repository';
import { TRADE_REPOSITORY } from './trade-repository.interface';
import { JOURNAL_CONFIG, loadJournalConfig } from '../config/journal.config';

@Module({
  controllers: [JournalController],
  providers: [
    { provide: JOURNAL_CONFIG, useFactory: () => loadJournalConfig() },
    { provide: TRADE_REPOSITORY, useClass: JsonTradeRepository },
    ImageStorageService,
    JournalService,      // Mutations: create, update, delete, images
    JournalQueryService, // Queries: list, get, preview, cost defaults
  ],
  exports: [JOURNAL_CONFIG, TRADE_REPOSITORY],
})
export class JournalModule {}
