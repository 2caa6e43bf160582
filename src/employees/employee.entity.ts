import { Column, CreateDateColumn, Entity, PrimaryColumn } from 'typeorm';
import type { OperatorRole } from '../users/user.entity';

@Entity({ name: 'employees' })
export class Employee {
  @PrimaryColumn({ type: 'varchar', length: 16 })
  id!: string;

  @Column({ type: 'varchar' })
  name!: string;

  @Column({ type: 'varchar', unique: true })
  phone!: string;

  @Column({ type: 'varchar', unique: true })
  email!: string;

  @Column({ type: 'varchar', length: 16 })
  role!: OperatorRole;

  /** YYYY-MM-DD */
  @Column({ type: 'varchar', length: 10 })
  joinDate!: string;

  @CreateDateColumn()
  createdAt!: Date;
}
