import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { JournalModule } from './journal/journal.module';

@Module({
  imports: [JournalModule],
  controllers: [AppController],
})
export class AppModule {}
