import { DataSource } from 'typeorm';
import { Product } from '../catalog/product.entity';
import { Supplier } from '../suppliers/supplier.entity';
import { ENTITIES } from './entities';

/** Fresh schema in a private in-memory sql.js database; used by service specs. */
export async function createInMemoryDataSource() {
  const dataSource = new DataSource({
    type: 'sqljs',
    entities: ENTITIES,
    synchronize: true,
  });
  return dataSource.initialize();
}

export function seedSupplier(dataSource: DataSource, overrides: Partial<Supplier> = {}) {
  return dataSource.getRepository(Supplier).save({
    id: '001',
    name: 'Meena Traders',
    company: 'Meena Wholesale',
    phone: '9876500001',
    email: null,
    address: null,
    ...overrides,
  });
}

/** Defaults: unit price 100 at 18% GST, so MRP 118. */
export function seedProduct(dataSource: DataSource, overrides: Partial<Product> = {}) {
  return dataSource.getRepository(Product).save({
    id: '001',
    name: 'Basmati Rice 1kg',
    category: 'Grocery',
    supplierId: '001',
    quantity: 10,
    costPrice: 80,
    unitPrice: 100,
    gst: 18,
    mrp: 118,
    reorderLevel: 3,
    ...overrides,
  });
}
