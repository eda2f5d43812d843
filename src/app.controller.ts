import { Controller, Get, Inject, Logger } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { TRADE_REPOSITORY, TradeRepository } from './journal/trade-repository.interface';

interface EndpointInfo {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE';
  path: string;
  description: string;
}

const JOURNAL_ENDPOINTS: EndpointInfo[] = [
  { method: 'GET', path: '/journal/trades', description: 'Journal history, newest date first' },
  { method: 'POST', path: '/journal/trades', description: 'Log a trade' },
  { method: 'GET', path: '/journal/trades/:id', description: 'One trade' },
  { method: 'PUT', path: '/journal/trades/:id', description: 'Edit a trade, recomputing pnl' },
  { method: 'DELETE', path: '/journal/trades/:id', description: 'Delete a trade and its screenshot' },
  { method: 'GET', path: '/journal/trades/:id/image', description: 'Download the screenshot' },
  { method: 'PUT', path: '/journal/trades/:id/image', description: 'Upload or replace the screenshot' },
  { method: 'DELETE', path: '/journal/trades/:id/image', description: 'Remove the screenshot' },
  { method: 'POST', path: '/journal/pnl/preview', description: 'Net P&L for unsaved values' },
  { method: 'GET', path: '/journal/cost-defaults', description: 'Default commissions and fees' },
];

@Controller()
export class AppController {
  private readonly logger = new Logger(AppController.name);

  constructor(@Inject(TRADE_REPOSITORY) private readonly repository: TradeRepository) {}

  /**
   * Reports "error" when the journal file cannot be read.
   * 
   * GET /health
   */
  @Get('health')
  async getHealth(): Promise<HealthResponse> {
    let status: HealthResponse['status'] = 'ok';
    let trades: number | undefined;
    try {
      trades = (await this.repository.list()).length;
    } catch (error) {
      status = 'error';
      this.logger.warn(`Journal unreadable: ${error instanceof Error ? error.message : String(error)}`);
    }

    return {
      status,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'trade-journal',
      trades,
    };
  }

  /**
   * Service name and the journal routes.
   * 
   * GET /
   */
  @Get()
  getRoot(): { message: string; version: string; endpoints: EndpointInfo[] } {
    return {
      message: 'Futures Trade Journal API',
      version: '1.0.0',
      endpoints: JOURNAL_ENDPOINTS,
    };
  }
}
