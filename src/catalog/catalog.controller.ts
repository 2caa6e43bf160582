import {
  Body,
  Controller,
  Delete,
  Get,
  Header,
  Param,
  Post,
  Put,
  Query,
  Req,
} from '@nestjs/common';
import { actorOf, AuthRequest } from '../auth/auth.types';
import { CatalogService, ProductInput } from './catalog.service';

@Controller('products')
export class CatalogController {
  constructor(private readonly catalogService: CatalogService) {}

  @Get()
  listProducts(
    @Query()
    query: {
      limit?: string;
      cursor?: string;
      search?: string;
      category?: string;
      supplierId?: string;
    },
  ) {
    return this.catalogService.listProducts(query);
  }

  @Get('export.csv')
  @Header('Content-Type', 'text/csv')
  exportCsv() {
    return this.catalogService.exportCsv();
  }

  @Get('scan/:code')
  lookupScannedCode(@Param('code') code: string) {
    return this.catalogService.resolveScannedCode(code);
  }

  @Get(':id')
  getProduct(@Param('id') id: string) {
    return this.catalogService.getProduct(id);
  }

  @Post()
  createProduct(@Req() req: AuthRequest, @Body() body: ProductInput) {
    return this.catalogService.createProduct(body, actorOf(req));
  }

  @Put(':id')
  updateProduct(
    @Param('id') id: string,
    @Req() req: AuthRequest,
    @Body() body: ProductInput,
  ) {
    return this.catalogService.updateProduct(id, body, actorOf(req));
  }

  @Post(':id/adjustments')
  adjustQuantity(
    @Param('id') id: string,
    @Req() req: AuthRequest,
    @Body() body: { delta?: number; reason?: string },
  ) {
    return this.catalogService.adjustQuantity(id, body, actorOf(req));
  }

  @Delete(':id')
  removeProduct(@Param('id') id: string) {
    return this.catalogService.removeProduct(id);
  }
}
