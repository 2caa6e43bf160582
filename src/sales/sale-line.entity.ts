import {
  Column,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { moneyColumn } from '../common/money';
import type { DiscountType } from './pricing';
import { Sale } from './sale.entity';

@Entity({ name: 'sale_lines' })
export class SaleLine {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  saleId!: number;

  @ManyToOne(() => Sale, (sale) => sale.lines, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'saleId' })
  sale?: Sale;

  @Column({ type: 'integer' })
  position!: number;

  @Column({ type: 'varchar', length: 16 })
  productId!: string;

  @Column({ type: 'varchar' })
  productName!: string;

  @Column({ type: 'varchar' })
  category!: string;

  @Column({ type: 'integer' })
  quantity!: number;

  @Column({ type: 'decimal', precision: 12, scale: 2, transformer: moneyColumn })
  mrp!: number;

  @Column({ type: 'decimal', precision: 12, scale: 2, transformer: moneyColumn })
  lineTotal!: number;

  @Column({ type: 'varchar', length: 8 })
  discountType!: DiscountType;

  @Column({ type: 'decimal', precision: 12, scale: 2, transformer: moneyColumn })
  discountValue!: number;

  @Column({ type: 'decimal', precision: 12, scale: 2, transformer: moneyColumn })
  discountAmount!: number;

  @Column({ type: 'decimal', precision: 12, scale: 2, transformer: moneyColumn })
  effectiveTotal!: number;

  @Column({ type: 'integer', default: 0 })
  refundedQuantity!: number;
}
