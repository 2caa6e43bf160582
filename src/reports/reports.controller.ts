import { Controller, Get, Header, Query } from '@nestjs/common';
import { ReportsService } from './reports.service';

@Controller('reports')
export class ReportsController {
  constructor(private readonly reportsService: ReportsService) {}

  @Get('dashboard')
  dashboard() {
    return this.reportsService.dashboard();
  }

  @Get('low-stock')
  lowStock() {
    return this.reportsService.lowStock();
  }

  @Get('sales-history')
  salesHistory(@Query() query: { from?: string; to?: string }) {
    return this.reportsService.salesHistory(query);
  }

  @Get('sales-history.csv')
  @Header('Content-Type', 'text/csv')
  @Header('Content-Disposition', 'attachment; filename="sales-history.csv"')
  salesHistoryCsv(@Query() query: { from?: string; to?: string }) {
    return this.reportsService.salesHistoryCsv(query);
  }

  @Get('top-products')
  topProducts(@Query() query: { from?: string; to?: string; limit?: string }) {
    return this.reportsService.topProducts(query);
  }

  @Get('profit-margin')
  profitMargin(@Query() query: { from?: string; to?: string }) {
    return this.reportsService.profitMargin(query);
  }

  @Get('daily-sales')
  dailySales(@Query() query: { days?: string }) {
    return this.reportsService.dailySales(query);
  }

  @Get('returns')
  returnHistory(@Query() query: { from?: string; to?: string }) {
    return this.reportsService.returnHistory(query);
  }
}
