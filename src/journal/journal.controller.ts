import {
  BadRequestException,
  Body,
  Controller,
  DefaultValuePipe,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
  StreamableFile,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { JournalService } from './journal.service';
import { JournalQueryService } from './journal-query.service';
import { ImageStorageService } from './image-storage.service';
import { CreateTradeDto } from './dto/create-trade.dto';
import { UpdateTradeDto } from './dto/update-trade.dto';
import { PnlPreviewDto, PnlPreviewResponseDto } from './dto/pnl-preview.dto';
import {
  CostDefaultsResponseDto,
  DeleteTradeResponseDto,
  TradeResponseDto,
} from './dto/trade-response.dto';

const MAX_IMAGE_BYTES = 10 * 1024 * 1024;

@Controller('journal')
export class JournalController {
  constructor(
    private readonly journalService: JournalService,
    private readonly queryService: JournalQueryService,
    private readonly images: ImageStorageService,
  ) {}

  /**
   * Journal history, newest date first.
   *
   * GET /journal/trades
   */
  @Get('trades')
  listTrades(): Promise<TradeResponseDto[]> {
    return this.queryService.listTrades();
  }

  /**
   * GET /journal/trades/:id
   */
  @Get('trades/:id')
  getTrade(@Param('id') id: string): Promise<TradeResponseDto> {
    return this.queryService.getTrade(id);
  }

  /**
   * Logs a new trade; pnl is computed server-side.
   *
   * POST /journal/trades
   * @returns 201 with the stored trade
   */
  @Post('trades')
  @HttpCode(HttpStatus.CREATED)
  async createTrade(@Body() dto: CreateTradeDto): Promise<TradeResponseDto> {
    const record = await this.journalService.createTrade(dto);
    return this.queryService.getTrade(record.id);
  }

  /**
   * Saves an edit and recomputes pnl.
   *
   * PUT /journal/trades/:id
   */
  @Put('trades/:id')
  async updateTrade(@Param('id') id: string, @Body() dto: UpdateTradeDto): Promise<TradeResponseDto> {
    await this.journalService.updateTrade(id, dto);
    return this.queryService.getTrade(id);
  }

  /**
   * Deletes the trade together with its screenshot.
   *
   * DELETE /journal/trades/:id
   */
  @Delete('trades/:id')
  async deleteTrade(@Param('id') id: string): Promise<DeleteTradeResponseDto> {
    const removed = await this.journalService.deleteTrade(id);
    return {
      message: 'Trade deleted successfully',
      id: removed.id,
      imageRemoved: Boolean(removed.tradeImagePath),
    };
  }

  /**
   * Uploads a PNG/JPEG screenshot, replacing the current one.
   *
   * PUT /journal/trades/:id/image (multipart field "image")
   */
  @Put('trades/:id/image')
  @UseInterceptors(FileInterceptor('image', { limits: { fileSize: MAX_IMAGE_BYTES } }))
  async attachImage(
    @Param('id') id: string,
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<TradeResponseDto> {
    if (!file) {
      throw new BadRequestException('Multipart field "image" is required');
    }
    await this.journalService.attachImage(id, file);
    return this.queryService.getTrade(id);
  }

  /**
   * DELETE /journal/trades/:id/image
   */
  @Delete('trades/:id/image')
  async removeImage(@Param('id') id: string): Promise<TradeResponseDto> {
    await this.journalService.removeImage(id);
    return this.queryService.getTrade(id);
  }

  /**
   * Streams the trade's screenshot.
   *
   * GET /journal/trades/:id/image
   */
  @Get('trades/:id/image')
  async getImage(@Param('id') id: string): Promise<StreamableFile> {
    const record = await this.queryService.findTrade(id);
    if (!record) {
      throw new NotFoundException(`Trade ${id} not found`);
    }

    const image = record.tradeImagePath ? await this.images.open(record.tradeImagePath) : undefined;
    if (!image) {
      throw new NotFoundException(`Trade ${id} has no image`);
    }
    return new StreamableFile(image.stream, { type: image.contentType });
  }

  /**
   * Net P&L for unsaved form values.
   *
   * POST /journal/pnl/preview
   */
  @Post('pnl/preview')
  @HttpCode(HttpStatus.OK)
  previewPnl(@Body() dto: PnlPreviewDto): PnlPreviewResponseDto {
    return this.queryService.previewPnl(dto);
  }

  /**
   * GET /journal/cost-defaults?contracts=2
   */
  @Get('cost-defaults')
  getCostDefaults(
    @Query('contracts', new DefaultValuePipe(1), ParseIntPipe) contracts: number,
  ): CostDefaultsResponseDto {
    if (contracts < 1) {
      throw new BadRequestException('contracts must be at least 1');
    }
    return this.queryService.getCostDefaults(contracts);
  }
}
