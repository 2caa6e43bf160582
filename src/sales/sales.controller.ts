import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Query,
  Req,
  Res,
} from '@nestjs/common';
import type { Response } from 'express';
import { actorOf, AuthRequest } from '../auth/auth.types';
import { ReturnEntryInput, ReturnsService } from './returns.service';
import { SalesService } from './sales.service';

@Controller()
export class SalesController {
  constructor(
    private readonly salesService: SalesService,
    private readonly returnsService: ReturnsService,
  ) {}

  @Get('sales')
  list(
    @Query()
    query: {
      limit?: string;
      cursor?: string;
      from?: string;
      to?: string;
      soldBy?: string;
      customer?: string;
    },
  ) {
    return this.salesService.list(query);
  }

  @Get('sales/returnable')
  listReturnable(@Query() query: { days?: string }) {
    return this.returnsService.listReturnableSales(query.days);
  }

  @Get('sales/:id')
  getSale(@Param('id', ParseIntPipe) id: number) {
    return this.salesService.getSaleDetail(id);
  }

  @Get('sales/:id/invoice')
  getInvoice(@Param('id', ParseIntPipe) id: number) {
    return this.salesService.getInvoice(id);
  }

  @Get('sales/:id/invoice.pdf')
  async getInvoicePdf(
    @Param('id', ParseIntPipe) id: number,
    @Res() res: Response,
  ) {
    const { invoice, pdf } = await this.salesService.renderInvoicePdf(id);
    res.setHeader('Content-Type', 'application/pdf');
    res.setHeader(
      'Content-Disposition',
      `attachment; filename="invoice-${invoice.invoiceNo}.pdf"`,
    );
    res.send(pdf);
  }

  /**
   * `reason` on the body applies to every item that does not carry its own.
   */
  @Post('sales/:id/returns')
  applyReturns(
    @Param('id', ParseIntPipe) id: number,
    @Req() req: AuthRequest,
    @Body() body: { items?: ReturnEntryInput[]; reason?: string },
  ) {
    const items = Array.isArray(body.items)
      ? body.items.map((item) => ({
          ...item,
          reason: item.reason ?? body.reason,
        }))
      : [];
    return this.returnsService.applyReturns(actorOf(req), id, items);
  }

  @Get('returns')
  listReturns(
    @Query()
    query: {
      limit?: string;
      cursor?: string;
      saleId?: string;
      productId?: string;
      from?: string;
      to?: string;
    },
  ) {
    return this.returnsService.listReturns(query);
  }
}
