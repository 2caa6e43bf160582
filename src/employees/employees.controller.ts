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
import { EmployeeInput, EmployeesService } from './employees.service';

@Controller('employees')
@Roles('Admin')
export class EmployeesController {
  constructor(private readonly employeesService: EmployeesService) {}

  @Get()
  list(
    @Query()
    query: {
      limit?: string;
      cursor?: string;
      search?: string;
      role?: string;
    },
  ) {
    return this.employeesService.list(query);
  }

  @Get(':id')
  getById(@Param('id') id: string) {
    return this.employeesService.getById(id);
  }

  @Post()
  create(@Body() body: EmployeeInput) {
    return this.employeesService.create(body);
  }

  @Put(':id')
  update(@Param('id') id: string, @Body() body: EmployeeInput) {
    return this.employeesService.update(id, body);
  }

  @Delete(':id')
  remove(@Param('id') id: string) {
    return this.employeesService.remove(id);
  }

  @Post(':id/login')
  createLogin(@Param('id') id: string) {
    return this.employeesService.createLogin(id);
  }
}
