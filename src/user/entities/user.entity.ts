import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  Index,
} from 'typeorm';
import { UserRole } from '../enums/user-role.enum';

@Entity('users')
@Index('IDX_users_role_specialty', ['role', 'specialty'])
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  // Texto libre: lo que no matchee el enum se lee como UNKNOWN
  @Column({ type: 'varchar', length: 20, default: UserRole.PATIENT })
  role!: string;

  // Solo para médicos
  @Column({ type: 'varchar', length: 100, nullable: true })
  specialty!: string | null;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
