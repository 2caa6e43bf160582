import {
  Column,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { moneyColumn } from '../common/money';

@Entity({ name: 'returns' })
export class SaleReturn {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'integer' })
  saleId!: number;

  @Column({ type: 'integer' })
  saleLineId!: number;

  @Column({ type: 'varchar', length: 16 })
  productId!: string;

  @Column({ type: 'integer' })
  quantity!: number;

  @Column({ type: 'decimal', precision: 12, scale: 2, transformer: moneyColumn })
  refundAmount!: number;

  @Column({ type: 'varchar' })
  reason!: string;

  @Column({ type: 'varchar' })
  processedBy!: string;

  @Column({ type: 'datetime' })
  returnedAt!: Date;
}
