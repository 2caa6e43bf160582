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
} from '@nestjs/common';
import { CustomerInput, CustomersService } from './customers.service';

@Controller('customers')
export class CustomersController {
  constructor(private readonly customersService: CustomersService) {}

  @Get()
  list(
    @Query()
    query: {
      limit?: string;
      cursor?: string;
      search?: string;
    },
  ) {
    return this.customersService.list(query);
  }

  @Get('export.csv')
  @Header('Content-Type', 'text/csv')
  exportCsv() {
    return this.customersService.exportCsv();
  }

  @Get(':id')
  getById(@Param('id') id: string) {
    return this.customersService.getById(id);
  }

  @Post()
  create(@Body() body: CustomerInput) {
    return this.customersService.create(body);
  }

  @Put(':id')
  update(@Param('id') id: string, @Body() body: CustomerInput) {
    return this.customersService.update(id, body);
  }

  @Delete(':id')
  remove(@Param('id') id: string) {
    return this.customersService.remove(id);
  }
}
