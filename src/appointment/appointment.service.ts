import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { defer, lastValueFrom, timeout, TimeoutError } from 'rxjs';
import { AppointmentStatus } from './enums/appointment-status.enum';
import { UserRole } from '../user/enums/user-role.enum';
import {
  canBeDeletedByDoctor,
  canReschedule,
  canTransition,
  isRescheduleRole,
  isTerminalStatus,
} from './policy/appointment-status.policy';
import {
  AppointmentError,
  AuthError,
  InvalidTransitionError,
  NotFoundError,
  StoreError,
  ValidationError,
  VersionConflictError,
} from './errors/appointment.errors';
import {
  buildNurseAssignmentNotification,
  buildRequestNotification,
  buildRescheduleNotification,
  buildStatusNotification,
  statusLabel,
} from './appointment.notifications';
import {
  APPOINTMENT_STORE,
  DOCTOR_DIRECTORY,
  USER_DIRECTORY,
  isParticipantRole,
} from './ports';
import type {
  AppointmentFieldUpdate,
  AppointmentRecord,
  AppointmentStorePort,
  DoctorDirectoryPort,
  DoctorSummary,
  NotificationMessage,
  UserDirectoryPort,
} from './ports';
import { NotificationDispatcher } from '../notification/notification.dispatcher';
import type { Actor } from '../auth/actor';
import { resolveStoreTimeoutMs } from '../database/database.utils';

// Primer intento + un reintento tras VersionConflict
const MAX_WRITE_ATTEMPTS = 2;

export enum ReschedulePolicy {
  KEEP = 'keep', // Reprogramar no toca el estado
  RECONFIRM = 'reconfirm', // Si el paciente reprograma un turno confirmado, vuelve a pending
}

export function parseReschedulePolicy(value: string | undefined): ReschedulePolicy {
  return value?.trim().toLowerCase() === ReschedulePolicy.RECONFIRM
    ? ReschedulePolicy.RECONFIRM
    : ReschedulePolicy.KEEP;
}

export interface RequestAppointmentInput {
  patientId: string;
  doctorId: string;
  reason: string;
  dateTime: Date;
  notes?: string | null;
}

type FieldChanges = Omit<AppointmentFieldUpdate, 'updatedAt'>;

interface CommittedChange {
  previous: AppointmentRecord;
  updated: AppointmentRecord;
}

/**
 * AppointmentService - Núcleo del ciclo de vida de un turno.
 *
 * Solo conoce puertos. Cada operación valida rol y transición contra la
 * política, escribe con compare-and-swap y recién después de confirmar la
 * escritura dispara la notificación a la contraparte.
 */
@Injectable()
export class AppointmentService {
  private readonly logger = new Logger(AppointmentService.name);
  private readonly storeTimeoutMs: number;
  private readonly reschedulePolicy: ReschedulePolicy;

  constructor(
    private readonly configService: ConfigService,
    @Inject(APPOINTMENT_STORE)
    private readonly appointmentStore: AppointmentStorePort,
    @Inject(DOCTOR_DIRECTORY)
    private readonly doctorDirectory: DoctorDirectoryPort,
    @Inject(USER_DIRECTORY)
    private readonly userDirectory: UserDirectoryPort,
    private readonly notificationDispatcher: NotificationDispatcher,
  ) {
    this.storeTimeoutMs = resolveStoreTimeoutMs(this.configService);
    this.reschedulePolicy = parseReschedulePolicy(
      this.configService.get<string>('RESCHEDULE_POLICY'),
    );
    this.logger.log(
      `⏱️ Store timeout=${this.storeTimeoutMs}ms, reprogramación=${this.reschedulePolicy}`,
    );
  }

  async requestAppointment(
    actor: Actor,
    input: RequestAppointmentInput,
  ): Promise<AppointmentRecord> {
    this.assertAuthenticated(actor);

    if (actor.role !== UserRole.PATIENT || actor.userId !== input.patientId) {
      throw new AuthError('Solo el paciente puede pedir sus propios turnos.');
    }

    const reason = input.reason.trim();

    if (!reason) {
      throw new ValidationError('El motivo del turno es obligatorio.');
    }

    this.assertUpcoming(input.dateTime);

    if (input.patientId === input.doctorId) {
      throw new ValidationError(
        'El paciente y el médico tienen que ser personas distintas.',
      );
    }

    const doctorExists = await this.withTimeout('doctorDirectory.exists', () =>
      this.doctorDirectory.exists(input.doctorId),
    );

    if (!doctorExists) {
      throw new ValidationError('El médico seleccionado no es válido.');
    }

    const [patient, doctor] = await Promise.all([
      this.withTimeout('userDirectory.findById', () =>
        this.userDirectory.findById(input.patientId),
      ),
      this.withTimeout('userDirectory.findById', () =>
        this.userDirectory.findById(input.doctorId),
      ),
    ]);
    const trimmedNotes = input.notes?.trim() ?? '';

    const appointmentId = await this.withTimeout('store.create', () =>
      this.appointmentStore.create({
        patientId: input.patientId,
        doctorId: input.doctorId,
        nurseId: null,
        patientName: patient?.name ?? 'Paciente',
        doctorName: doctor?.name ?? 'Médico',
        dateTime: input.dateTime,
        reason,
        notes: trimmedNotes.length > 0 ? trimmedNotes : null,
        status: AppointmentStatus.PENDING,
      }),
    );

    // Releemos para devolver lo que asignó el store (id, fechas, versión)
    const created = await this.withTimeout('store.get', () =>
      this.appointmentStore.get(appointmentId),
    );

    if (!created) {
      this.logger.error(
        `❌ El turno ${appointmentId} no aparece después de crearlo`,
      );
      throw new StoreError();
    }

    this.logger.log(
      `📅 Turno ${created.id} solicitado por ${created.patientId} a ${created.doctorId}`,
    );
    this.notificationDispatcher.dispatch(buildRequestNotification(created));

    return created;
  }

  async setStatus(
    appointmentId: string,
    newStatus: AppointmentStatus,
    actor: Actor,
  ): Promise<AppointmentRecord> {
    this.assertAuthenticated(actor);

    const { previous, updated } = await this.applyChange(
      appointmentId,
      (current) => {
        this.assertParticipant(current, actor);

        if (!canTransition(current.status, newStatus, actor.role)) {
          throw new InvalidTransitionError(
            `No se puede pasar el turno de ${statusLabel(current.status)} a ${statusLabel(newStatus)}.`,
          );
        }

        return { status: newStatus };
      },
    );

    this.logger.log(
      `🔄 Turno ${appointmentId}: ${previous.status} → ${updated.status} (${actor.role} ${actor.userId})`,
    );
    this.notifyCounterpart(updated, actor, buildStatusNotification);

    return updated;
  }

  async reschedule(
    appointmentId: string,
    newDateTime: Date,
    actor: Actor,
  ): Promise<AppointmentRecord> {
    this.assertAuthenticated(actor);
    this.assertUpcoming(newDateTime);

    const { previous, updated } = await this.applyChange(
      appointmentId,
      (current) => {
        if (!isRescheduleRole(actor.role)) {
          throw new InvalidTransitionError('Tu rol no puede reprogramar turnos.');
        }

        this.assertParticipant(current, actor);

        if (!canReschedule(current.status, actor.role)) {
          throw new InvalidTransitionError(
            `Un turno ${statusLabel(current.status)} no se puede reprogramar.`,
          );
        }

        if (current.dateTime.getTime() === newDateTime.getTime()) {
          throw new ValidationError('La nueva fecha es igual a la actual.');
        }

        const status = this.statusAfterReschedule(current.status, actor.role);

        return status === current.status
          ? { dateTime: newDateTime }
          : { dateTime: newDateTime, status };
      },
    );

    this.logger.log(
      `🗓️ Turno ${appointmentId} reprogramado: ${previous.dateTime.toISOString()} → ${updated.dateTime.toISOString()}`,
    );
    this.notifyCounterpart(updated, actor, buildRescheduleNotification);

    return updated;
  }

  async deleteAppointment(appointmentId: string, actor: Actor): Promise<void> {
    this.assertAuthenticated(actor);

    if (actor.role !== UserRole.DOCTOR) {
      throw new AuthError('Solo el médico puede eliminar turnos.');
    }

    const current = await this.fetchExisting(appointmentId);

    this.assertParticipant(current, actor);

    if (!canBeDeletedByDoctor(current.status)) {
      throw new InvalidTransitionError(
        `Solo se pueden eliminar turnos cerrados (este está ${statusLabel(current.status)}).`,
      );
    }

    const deleted = await this.withTimeout('store.delete', () =>
      this.appointmentStore.delete(appointmentId),
    );

    // Otro request lo borró entre la lectura y el delete
    if (!deleted) {
      throw new NotFoundError('El turno no existe.', appointmentId);
    }

    this.logger.log(`🗑️ Turno ${appointmentId} eliminado por ${actor.userId}`);
  }

  async listForRole(
    actor: Actor,
    statusFilter?: AppointmentStatus,
  ): Promise<AppointmentRecord[]> {
    this.assertAuthenticated(actor);

    const role = actor.role;

    if (!isParticipantRole(role)) {
      throw new AuthError('Tu rol no tiene turnos asignados.');
    }

    const appointments = await this.withTimeout(
      'store.listByParticipant',
      () =>
        this.appointmentStore.listByParticipant(
          actor.userId,
          role,
          statusFilter,
        ),
    );

    this.logger.debug(
      `${appointments.length} turnos para ${role} ${actor.userId} (filtro: ${statusFilter ?? 'todos'})`,
    );

    return appointments;
  }

  async getAppointment(
    appointmentId: string,
    actor: Actor,
  ): Promise<AppointmentRecord> {
    this.assertAuthenticated(actor);

    const appointment = await this.fetchExisting(appointmentId);

    this.assertParticipant(appointment, actor);
    return appointment;
  }

  /**
   * Asigna (o con `null` quita) la enfermería del turno.
   * Solo el médico del turno y mientras no esté cerrado.
   */
  async assignNurse(
    appointmentId: string,
    nurseId: string | null,
    actor: Actor,
  ): Promise<AppointmentRecord> {
    this.assertAuthenticated(actor);

    if (actor.role !== UserRole.DOCTOR) {
      throw new AuthError('Solo el médico puede asignar enfermería.');
    }

    if (nurseId !== null) {
      const nurse = await this.withTimeout('userDirectory.findById', () =>
        this.userDirectory.findById(nurseId),
      );

      if (!nurse || !nurse.isActive || nurse.role !== UserRole.NURSE) {
        throw new ValidationError(
          'El profesional de enfermería seleccionado no es válido.',
        );
      }
    }

    const { updated } = await this.applyChange(appointmentId, (current) => {
      this.assertParticipant(current, actor);

      if (isTerminalStatus(current.status)) {
        throw new InvalidTransitionError(
          'No se puede cambiar la asignación de un turno cerrado.',
        );
      }

      if (current.nurseId === nurseId) {
        throw new ValidationError(
          nurseId
            ? 'Ese profesional ya está asignado al turno.'
            : 'El turno no tiene enfermería asignada.',
        );
      }

      return { nurseId };
    });

    this.logger.log(
      `🩺 Turno ${appointmentId}: enfermería ${nurseId ?? 'sin asignar'}`,
    );

    if (nurseId) {
      this.notificationDispatcher.dispatch(
        buildNurseAssignmentNotification(updated, nurseId),
      );
    }

    return updated;
  }

  async listAvailableDoctors(specialty?: string): Promise<DoctorSummary[]> {
    return this.withTimeout('doctorDirectory.listAvailable', () =>
      this.doctorDirectory.listAvailable(specialty),
    );
  }

  // --- PRIVATE HELPERS ---

  /**
   * Lee, planifica y escribe con compare-and-swap. Ante un VersionConflict
   * relee y vuelve a evaluar la política una sola vez.
   */
  private async applyChange(
    appointmentId: string,
    plan: (current: AppointmentRecord) => FieldChanges,
  ): Promise<CommittedChange> {
    for (let attempt = 1; ; attempt++) {
      const current = await this.fetchExisting(appointmentId);
      const changes = plan(current);

      try {
        const updated = await this.withTimeout('store.updateFields', () =>
          this.appointmentStore.updateFields(
            appointmentId,
            { ...changes, updatedAt: new Date() },
            current.version,
          ),
        );

        return { previous: current, updated };
      } catch (error: unknown) {
        if (
          error instanceof VersionConflictError &&
          attempt < MAX_WRITE_ATTEMPTS
        ) {
          this.logger.warn(
            `⚠️ Turno ${appointmentId} cambió durante la escritura; releyendo`,
          );
          continue;
        }

        throw error;
      }
    }
  }

  private async fetchExisting(
    appointmentId: string,
  ): Promise<AppointmentRecord> {
    const appointment = await this.withTimeout('store.get', () =>
      this.appointmentStore.get(appointmentId),
    );

    if (!appointment) {
      throw new NotFoundError('El turno no existe.', appointmentId);
    }

    return appointment;
  }

  /**
   * Acota cada llamada a persistencia. Timeout y fallas del driver salen
   * como StoreError; los errores de dominio pasan tal cual.
   */
  private async withTimeout<T>(
    operation: string,
    call: () => Promise<T>,
  ): Promise<T> {
    try {
      return await lastValueFrom(defer(call).pipe(timeout(this.storeTimeoutMs)));
    } catch (error: unknown) {
      if (error instanceof AppointmentError) {
        throw error;
      }

      if (error instanceof TimeoutError) {
        this.logger.error(
          `⌛ ${operation} superó ${this.storeTimeoutMs}ms`,
        );
        throw new StoreError({ cause: error });
      }

      const err = error instanceof Error ? error : new Error(String(error));

      this.logger.error(`❌ ${operation} falló: ${err.message}`, err.stack);
      throw new StoreError({ cause: error });
    }
  }

  private assertAuthenticated(actor: Actor): void {
    if (actor.role === UserRole.UNKNOWN || !actor.userId) {
      throw new AuthError('Tenés que iniciar sesión.', HttpStatus.UNAUTHORIZED);
    }
  }

  private assertParticipant(appointment: AppointmentRecord, actor: Actor): void {
    const participates =
      (actor.role === UserRole.PATIENT &&
        appointment.patientId === actor.userId) ||
      (actor.role === UserRole.DOCTOR &&
        appointment.doctorId === actor.userId) ||
      (actor.role === UserRole.NURSE && appointment.nurseId === actor.userId);

    if (!participates) {
      throw new AuthError('No participás de este turno.');
    }
  }

  private assertUpcoming(dateTime: Date): void {
    if (!(dateTime instanceof Date) || Number.isNaN(dateTime.getTime())) {
      throw new ValidationError('La fecha del turno no es válida.');
    }

    if (dateTime.getTime() < Date.now()) {
      throw new ValidationError(
        'La fecha del turno no puede estar en el pasado.',
      );
    }
  }

  private statusAfterReschedule(
    status: AppointmentStatus,
    role: UserRole,
  ): AppointmentStatus {
    const needsReconfirmation =
      this.reschedulePolicy === ReschedulePolicy.RECONFIRM &&
      role === UserRole.PATIENT &&
      status === AppointmentStatus.CONFIRMED;

    return needsReconfirmation ? AppointmentStatus.PENDING : status;
  }

  // Paciente → médico; médico o enfermería → paciente
  private notifyCounterpart(
    appointment: AppointmentRecord,
    actor: Actor,
    build: (
      appointment: AppointmentRecord,
      targetUserId: string,
    ) => NotificationMessage,
  ): void {
    const targetUserId =
      actor.role === UserRole.PATIENT
        ? appointment.doctorId
        : appointment.patientId;

    this.notificationDispatcher.dispatch(build(appointment, targetUserId));
  }
}
