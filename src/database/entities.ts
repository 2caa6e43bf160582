import { Product } from '../catalog/product.entity';
import { Customer } from '../customers/customer.entity';
import { Employee } from '../employees/employee.entity';
import { SaleLine } from '../sales/sale-line.entity';
import { SaleReturn } from '../sales/sale-return.entity';
import { Sale } from '../sales/sale.entity';
import { StockLog } from '../stock/stock-log.entity';
import { Supplier } from '../suppliers/supplier.entity';
import { User } from '../users/user.entity';

export const ENTITIES = [
  Supplier,
  Product,
  Customer,
  Employee,
  User,
  Sale,
  SaleLine,
  SaleReturn,
  StockLog,
];
