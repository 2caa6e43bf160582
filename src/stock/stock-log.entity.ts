import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';

export type StockChangeType = 'IN' | 'OUT';

@Entity({ name: 'stock_logs' })
export class StockLog {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'varchar', length: 16 })
  productId!: string;

  @Column({ type: 'varchar' })
  productName!: string;

  @Column({ type: 'varchar', length: 3 })
  changeType!: StockChangeType;

  @Column({ type: 'integer' })
  quantity!: number;

  @Column({ type: 'varchar' })
  reason!: string;

  @Column({ type: 'varchar' })
  changedBy!: string;

  @CreateDateColumn()
  loggedAt!: Date;
}
