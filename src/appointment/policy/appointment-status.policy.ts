import { AppointmentStatus } from '../enums/appointment-status.enum';
import { UserRole } from '../../user/enums/user-role.enum';

/**
 * StatusPolicy - Reglas puras del ciclo de vida de un turno.
 *
 * Nada acá toca la base ni la red: el servicio y las vistas consultan estas
 * funciones antes de intentar cualquier cambio.
 */

interface StatusTransition {
  from: AppointmentStatus;
  to: AppointmentStatus;
  roles: readonly UserRole[];
}

const TRANSITIONS: readonly StatusTransition[] = [
  {
    from: AppointmentStatus.PENDING,
    to: AppointmentStatus.CONFIRMED,
    roles: [UserRole.DOCTOR],
  },
  {
    from: AppointmentStatus.PENDING,
    to: AppointmentStatus.DECLINED,
    roles: [UserRole.DOCTOR],
  },
  {
    from: AppointmentStatus.PENDING,
    to: AppointmentStatus.CANCELLED,
    roles: [UserRole.PATIENT],
  },
  {
    from: AppointmentStatus.CONFIRMED,
    to: AppointmentStatus.CANCELLED,
    roles: [UserRole.PATIENT],
  },
  {
    from: AppointmentStatus.CONFIRMED,
    to: AppointmentStatus.SCHEDULED,
    roles: [UserRole.DOCTOR, UserRole.NURSE],
  },
  {
    from: AppointmentStatus.CONFIRMED,
    to: AppointmentStatus.COMPLETED,
    roles: [UserRole.DOCTOR],
  },
  {
    from: AppointmentStatus.SCHEDULED,
    to: AppointmentStatus.COMPLETED,
    roles: [UserRole.DOCTOR],
  },
];

const TERMINAL_STATUSES: readonly AppointmentStatus[] = [
  AppointmentStatus.COMPLETED,
  AppointmentStatus.CANCELLED,
  AppointmentStatus.DECLINED,
];

const ACTIVE_STATUSES: readonly AppointmentStatus[] = [
  AppointmentStatus.PENDING,
  AppointmentStatus.CONFIRMED,
  AppointmentStatus.SCHEDULED,
];

const RESCHEDULE_ROLES: readonly UserRole[] = [
  UserRole.PATIENT,
  UserRole.DOCTOR,
];

export function isTerminalStatus(status: AppointmentStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canBeApprovedOrDeclined(status: AppointmentStatus): boolean {
  return status === AppointmentStatus.PENDING;
}

export function canBeCancelled(status: AppointmentStatus): boolean {
  return ACTIVE_STATUSES.includes(status);
}

export function canBeCompletedByDoctor(status: AppointmentStatus): boolean {
  return (
    status === AppointmentStatus.CONFIRMED ||
    status === AppointmentStatus.SCHEDULED
  );
}

export function canBeRescheduled(status: AppointmentStatus): boolean {
  return ACTIVE_STATUSES.includes(status);
}

// Solo se purgan turnos cerrados
export function canBeDeletedByDoctor(status: AppointmentStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * ¿Puede `role` mover un turno de `from` a `to`?
 * Mover al mismo estado nunca es una transición válida.
 */
export function canTransition(
  from: AppointmentStatus,
  to: AppointmentStatus,
  role: UserRole,
): boolean {
  return TRANSITIONS.some(
    (transition) =>
      transition.from === from &&
      transition.to === to &&
      transition.roles.includes(role),
  );
}

/** Destinos permitidos para un rol desde un estado (para habilitar acciones en la UI). */
export function allowedTransitions(
  from: AppointmentStatus,
  role: UserRole,
): AppointmentStatus[] {
  return TRANSITIONS.filter(
    (transition) => transition.from === from && transition.roles.includes(role),
  ).map((transition) => transition.to);
}

export function isRescheduleRole(role: UserRole): boolean {
  return RESCHEDULE_ROLES.includes(role);
}

export function canReschedule(
  status: AppointmentStatus,
  role: UserRole,
): boolean {
  return isRescheduleRole(role) && canBeRescheduled(status);
}
