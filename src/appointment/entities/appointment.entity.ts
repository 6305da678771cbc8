import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  VersionColumn,
  Index,
} from 'typeorm';
import { AppointmentStatus } from '../enums/appointment-status.enum';

@Entity('appointments')
@Index('IDX_appointments_patient_date', ['patientId', 'dateTime'])
@Index('IDX_appointments_doctor_date', ['doctorId', 'dateTime'])
@Index('IDX_appointments_nurse_date', ['nurseId', 'dateTime'])
export class Appointment {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  patientId!: string;

  @Column({ type: 'uuid' })
  doctorId!: string;

  @Column({ type: 'uuid', nullable: true })
  nurseId!: string | null;

  // Nombres desnormalizados al crear el turno (no son fuente de verdad)
  @Column({ type: 'varchar', length: 100 })
  patientName!: string;

  @Column({ type: 'varchar', length: 100 })
  doctorName!: string;

  @Column({ type: 'timestamptz' })
  dateTime!: Date;

  @Column({ type: 'text' })
  reason!: string;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  // varchar y no enum de Postgres: un valor viejo o inesperado se decodifica como pending
  @Column({ type: 'varchar', length: 20, default: AppointmentStatus.PENDING })
  status!: string;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;

  // Token del compare-and-swap en updateFields
  @VersionColumn({ default: 1 })
  version!: number;
}
