import {
  Column,
  Entity,
  Index,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { moneyColumn } from '../common/money';
import { SaleLine } from './sale-line.entity';

@Entity({ name: 'sales' })
export class Sale {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'datetime' })
  soldAt!: Date;

  @Column({ type: 'varchar' })
  soldBy!: string;

  @Column({ type: 'varchar', length: 16, nullable: true })
  customerId!: string | null;

  @Column({ type: 'varchar' })
  customerName!: string;

  @Column({ type: 'varchar', nullable: true })
  customerPhone!: string | null;

  @Column({ type: 'varchar', nullable: true })
  customerEmail!: string | null;

  @Column({ type: 'decimal', precision: 12, scale: 2, transformer: moneyColumn })
  subtotal!: number;

  @Column({ type: 'decimal', precision: 12, scale: 2, transformer: moneyColumn })
  grandTotal!: number;

  @OneToMany(() => SaleLine, (line) => line.sale)
  lines?: SaleLine[];
}
