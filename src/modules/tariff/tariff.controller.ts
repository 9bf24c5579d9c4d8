import { Body, Controller, Get, Header, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { CalendarDatePipe } from '../../common/validation/calendar-date.pipe';
import { EditTariffDto } from './dto/edit-tariff.dto';
import { EvaluateCostDto } from './dto/evaluate-cost.dto';
import { TariffKeyDto } from './dto/tariff-key.dto';
import { TariffRecord } from './interfaces/tariff.interface';
import { TariffDataPipe } from './pipes/tariff-data.pipe';
import { TariffService } from './tariff.service';

/**
 * TariffController - public cost evaluation and internal tariff maintenance
 */
@Controller()
export class TariffController {
  constructor(private readonly tariffService: TariffService) {}

  /**
   * Insurance cost as a bare JSON number
   * POST /api/public/evaluate_cost
   */
  @Post('public/evaluate_cost')
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', 'application/json')
  async evaluateCost(@Body() evaluateDto: EvaluateCostDto): Promise<string> {
    const cost = await this.tariffService.evaluateCost(evaluateDto);
    return JSON.stringify(cost);
  }

  /**
   * Upsert tariffs keyed by date; answers with the affected tariffs only
   * POST /api/internal/tariffs/load
   */
  @Post('internal/tariffs/load')
  @HttpCode(HttpStatus.OK)
  async load(@Body(TariffDataPipe) tariffs: TariffRecord[]): Promise<TariffRecord[]> {
    return this.tariffService.loadTariffs(tariffs);
  }

  /**
   * POST /api/internal/tariffs/update
   */
  @Post('internal/tariffs/update')
  @HttpCode(HttpStatus.OK)
  async update(@Body() editDto: EditTariffDto): Promise<{ detail: string }> {
    await this.tariffService.editTariff(editDto);
    return { detail: 'Success' };
  }

  /**
   * POST /api/internal/tariffs/delete
   */
  @Post('internal/tariffs/delete')
  @HttpCode(HttpStatus.OK)
  async delete(@Body() keyDto: TariffKeyDto): Promise<TariffRecord> {
    return this.tariffService.deleteTariff(keyDto);
  }

  /**
   * GET /api/internal/tariffs/:date
   */
  @Get('internal/tariffs/:date')
  async list(@Param('date', CalendarDatePipe) date: string): Promise<TariffRecord[]> {
    return this.tariffService.listTariffs(date);
  }
}
