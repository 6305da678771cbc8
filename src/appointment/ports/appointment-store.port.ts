import { AppointmentStatus } from '../enums/appointment-status.enum';
import { UserRole } from '../../user/enums/user-role.enum';

/**
 * Puerto de salida: persistencia de turnos.
 *
 * El servicio solo conoce este contrato; el adaptador TypeORM y el store en
 * memoria de los tests lo implementan.
 */
export interface AppointmentStorePort {
  /** Devuelve el id asignado por el store. */
  create(record: NewAppointmentRecord): Promise<string>;
  get(appointmentId: string): Promise<AppointmentRecord | null>;
  /** Ordenados por `dateTime` ascendente. */
  listByParticipant(
    userId: string,
    role: ParticipantRole,
    status?: AppointmentStatus,
  ): Promise<AppointmentRecord[]>;
  /**
   * Compare-and-swap sobre `version`.
   * @throws VersionConflictError si el turno cambió desde `expectedVersion`
   * @throws NotFoundError si el turno ya no existe
   */
  updateFields(
    appointmentId: string,
    fields: AppointmentFieldUpdate,
    expectedVersion: number,
  ): Promise<AppointmentRecord>;
  /** `false` si no existía. */
  delete(appointmentId: string): Promise<boolean>;
}

/**
 * DTO de dominio del turno. No es la entidad de TypeORM.
 */
export interface AppointmentRecord {
  id: string;
  patientId: string;
  doctorId: string;
  nurseId: string | null;
  patientName: string; // Desnormalizado al crear, solo para mostrar
  doctorName: string;
  dateTime: Date;
  reason: string;
  notes: string | null;
  status: AppointmentStatus;
  createdAt: Date;
  updatedAt: Date;
  version: number;
}

export type NewAppointmentRecord = Omit<
  AppointmentRecord,
  'id' | 'createdAt' | 'updatedAt' | 'version'
>;

export type AppointmentFieldUpdate = Partial<
  Pick<AppointmentRecord, 'status' | 'dateTime' | 'nurseId' | 'notes'>
> & { updatedAt: Date };

export type ParticipantRole = UserRole.PATIENT | UserRole.DOCTOR | UserRole.NURSE;

export function isParticipantRole(role: UserRole): role is ParticipantRole {
  return (
    role === UserRole.PATIENT ||
    role === UserRole.DOCTOR ||
    role === UserRole.NURSE
  );
}

export const APPOINTMENT_STORE = Symbol('APPOINTMENT_STORE');
