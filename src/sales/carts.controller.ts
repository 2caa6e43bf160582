import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Req,
} from '@nestjs/common';
import { actorOf, AuthRequest } from '../auth/auth.types';
import { AddLineInput, CartsService } from './carts.service';
import { parseCustomerSelection } from './customer-selection';

@Controller('cart')
export class CartsController {
  constructor(private readonly cartsService: CartsService) {}

  @Get()
  view(@Req() req: AuthRequest) {
    return this.cartsService.view(actorOf(req));
  }

  @Post('lines')
  addLine(@Req() req: AuthRequest, @Body() body: AddLineInput) {
    return this.cartsService.addLine(actorOf(req), body);
  }

  @Post('scan')
  scan(@Req() req: AuthRequest, @Body() body: { code?: string }) {
    return this.cartsService.addScanned(actorOf(req), body.code);
  }

  @Post('lines/:lineId/remove-one')
  removeOne(
    @Req() req: AuthRequest,
    @Param('lineId', ParseIntPipe) lineId: number,
  ) {
    return this.cartsService.removeOne(actorOf(req), lineId);
  }

  @Delete()
  clear(@Req() req: AuthRequest) {
    return this.cartsService.clear(actorOf(req));
  }

  @Post('checkout')
  checkout(@Req() req: AuthRequest, @Body() body: { customer?: unknown }) {
    return this.cartsService.checkout(
      actorOf(req),
      parseCustomerSelection(body?.customer),
    );
  }
}
