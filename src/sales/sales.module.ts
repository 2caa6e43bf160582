import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { CustomersModule } from '../customers/customers.module';
import { MailerModule } from '../mailer/mailer.module';
import { StockModule } from '../stock/stock.module';
import { CartsController } from './carts.controller';
import { CartsService } from './carts.service';
import { InvoiceDeliveryService } from './invoice-delivery.service';
import { ReturnsService } from './returns.service';
import { SalesController } from './sales.controller';
import { SalesService } from './sales.service';

@Module({
  imports: [CatalogModule, CustomersModule, MailerModule, StockModule],
  controllers: [SalesController, CartsController],
  providers: [
    SalesService,
    ReturnsService,
    CartsService,
    InvoiceDeliveryService,
  ],
  exports: [SalesService, ReturnsService],
})
export class SalesModule {}
