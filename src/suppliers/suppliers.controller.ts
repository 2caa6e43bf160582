import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { Roles } from '../auth/roles.decorator';
import { SupplierInput, SuppliersService } from './suppliers.service';

@Controller('suppliers')
@Roles('Admin')
export class SuppliersController {
  constructor(private readonly suppliersService: SuppliersService) {}

  @Get()
  list(
    @Query()
    query: {
      limit?: string;
      cursor?: string;
      search?: string;
    },
  ) {
    return this.suppliersService.list(query);
  }

  @Get(':id')
  getById(@Param('id') id: string) {
    return this.suppliersService.getById(id);
  }

  @Post()
  create(@Body() body: SupplierInput) {
    return this.suppliersService.create(body);
  }

  @Put(':id')
  update(@Param('id') id: string, @Body() body: SupplierInput) {
    return this.suppliersService.update(id, body);
  }

  @Delete(':id')
  remove(@Param('id') id: string) {
    return this.suppliersService.remove(id);
  }
}
