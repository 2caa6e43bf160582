import { Column, CreateDateColumn, Entity, PrimaryColumn } from 'typeorm';

export const OPERATOR_ROLES = ['Admin', 'Employee'] as const;
export type OperatorRole = (typeof OPERATOR_ROLES)[number];

export const isOperatorRole = (value: unknown): value is OperatorRole =>
  typeof value === 'string' &&
  OPERATOR_ROLES.some((role) => role === value);

@Entity({ name: 'users' })
export class User {
  @PrimaryColumn({ type: 'varchar', length: 64 })
  username!: string;

  @Column({ type: 'varchar' })
  passwordHash!: string;

  @Column({ type: 'varchar', length: 16 })
  role!: OperatorRole;

  @Column({ type: 'varchar', length: 16, nullable: true })
  employeeId!: string | null;

  @Column({ type: 'boolean', default: false })
  isOnline!: boolean;

  @Column({ type: 'datetime', nullable: true })
  lastLoginAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;
}
