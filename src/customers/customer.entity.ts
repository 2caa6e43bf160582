import { Column, CreateDateColumn, Entity, PrimaryColumn } from 'typeorm';

@Entity({ name: 'customers' })
export class Customer {
  @PrimaryColumn({ type: 'varchar', length: 16 })
  id!: string;

  @Column({ type: 'varchar' })
  name!: string;

  @Column({ type: 'varchar', nullable: true, unique: true })
  phone!: string | null;

  @Column({ type: 'varchar', nullable: true, unique: true })
  email!: string | null;

  @CreateDateColumn()
  createdAt!: Date;
}
