import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import type { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { Appointment } from './entities/appointment.entity';
import {
  AppointmentStatus,
  isAppointmentStatus,
  parseAppointmentStatus,
} from './enums/appointment-status.enum';
import { UserRole } from '../user/enums/user-role.enum';
import { isUuid } from '../database/database.utils';
import {
  NotFoundError,
  VersionConflictError,
} from './errors/appointment.errors';
import type {
  AppointmentFieldUpdate,
  AppointmentRecord,
  AppointmentStorePort,
  NewAppointmentRecord,
  ParticipantRole,
} from './ports';

/**
 * Adaptador: implementa AppointmentStorePort con TypeORM (Postgres).
 *
 * Si cambiamos de base, solo cambia este archivo.
 */
@Injectable()
export class AppointmentAdapter implements AppointmentStorePort {
  private readonly logger = new Logger(AppointmentAdapter.name);

  constructor(
    @InjectRepository(Appointment)
    private readonly appointmentRepository: Repository<Appointment>,
  ) {}

  async create(record: NewAppointmentRecord): Promise<string> {
    const appointment = this.appointmentRepository.create({
      patientId: record.patientId,
      doctorId: record.doctorId,
      nurseId: record.nurseId,
      patientName: record.patientName,
      doctorName: record.doctorName,
      dateTime: record.dateTime,
      reason: record.reason,
      notes: record.notes,
      status: record.status,
    });

    const saved = await this.appointmentRepository.save(appointment);
    return saved.id;
  }

  async get(appointmentId: string): Promise<AppointmentRecord | null> {
    if (!isUuid(appointmentId)) {
      return null;
    }

    const appointment = await this.appointmentRepository.findOneBy({
      id: appointmentId,
    });

    if (!appointment) {
      return null;
    }

    return this.toData(appointment);
  }

  async listByParticipant(
    userId: string,
    role: ParticipantRole,
    status?: AppointmentStatus,
  ): Promise<AppointmentRecord[]> {
    const where: FindOptionsWhere<Appointment> = this.participantWhere(
      userId,
      role,
    );

    if (status) {
      where.status = status;
    }

    const appointments = await this.appointmentRepository.find({
      where,
      order: { dateTime: 'ASC' },
    });

    return appointments.map((appointment) => this.toData(appointment));
  }

  async updateFields(
    appointmentId: string,
    fields: AppointmentFieldUpdate,
    expectedVersion: number,
  ): Promise<AppointmentRecord> {
    if (!isUuid(appointmentId)) {
      throw new NotFoundError('El turno no existe.', appointmentId);
    }

    const changes: QueryDeepPartialEntity<Appointment> = {
      updatedAt: fields.updatedAt,
      version: () => '"version" + 1',
    };

    if (fields.status !== undefined) {
      changes.status = fields.status;
    }

    if (fields.dateTime !== undefined) {
      changes.dateTime = fields.dateTime;
    }

    if (fields.nurseId !== undefined) {
      changes.nurseId = fields.nurseId;
    }

    if (fields.notes !== undefined) {
      changes.notes = fields.notes;
    }

    // UPDATE ... WHERE id = :id AND version = :expectedVersion
    const result = await this.appointmentRepository
      .createQueryBuilder()
      .update(Appointment)
      .set(changes)
      .where('id = :appointmentId', { appointmentId })
      .andWhere('version = :expectedVersion', { expectedVersion })
      .execute();

    if (!result.affected) {
      const exists = await this.appointmentRepository.existsBy({
        id: appointmentId,
      });

      if (!exists) {
        throw new NotFoundError('El turno no existe.', appointmentId);
      }

      this.logger.warn(
        `Conflicto de versión en turno ${appointmentId} (esperada ${expectedVersion})`,
      );
      throw new VersionConflictError(appointmentId, expectedVersion);
    }

    const updated = await this.appointmentRepository.findOneBy({
      id: appointmentId,
    });

    if (!updated) {
      throw new NotFoundError('El turno no existe.', appointmentId);
    }

    return this.toData(updated);
  }

  async delete(appointmentId: string): Promise<boolean> {
    if (!isUuid(appointmentId)) {
      return false;
    }

    const result = await this.appointmentRepository.delete({
      id: appointmentId,
    });

    return (result.affected ?? 0) > 0;
  }

  private participantWhere(
    userId: string,
    role: ParticipantRole,
  ): FindOptionsWhere<Appointment> {
    switch (role) {
      case UserRole.PATIENT:
        return { patientId: userId };
      case UserRole.DOCTOR:
        return { doctorId: userId };
      case UserRole.NURSE:
        return { nurseId: userId };
    }
  }

  /**
   * Mapper: Entidad -> DTO de dominio
   */
  private toData(appointment: Appointment): AppointmentRecord {
    if (!isAppointmentStatus(appointment.status)) {
      this.logger.warn(
        `Estado desconocido "${appointment.status}" en turno ${appointment.id}; se lee como pending`,
      );
    }

    return {
      id: appointment.id,
      patientId: appointment.patientId,
      doctorId: appointment.doctorId,
      nurseId: appointment.nurseId ?? null,
      patientName: appointment.patientName,
      doctorName: appointment.doctorName,
      dateTime: appointment.dateTime,
      reason: appointment.reason,
      notes: appointment.notes ?? null,
      status: parseAppointmentStatus(appointment.status),
      createdAt: appointment.createdAt,
      updatedAt: appointment.updatedAt,
      version: appointment.version,
    };
  }
}
