import { Controller, Get, Query } from '@nestjs/common';
import { StockService } from './stock.service';

@Controller('stock')
export class StockController {
  constructor(private readonly stockService: StockService) {}

  @Get('logs')
  listLogs(
    @Query()
    query: {
      limit?: string;
      cursor?: string;
      productId?: string;
      type?: string;
      search?: string;
      from?: string;
      to?: string;
    },
  ) {
    return this.stockService.listLogs(query);
  }
}
