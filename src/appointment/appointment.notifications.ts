import { AppointmentStatus } from './enums/appointment-status.enum';
import type { AppointmentRecord, NotificationMessage } from './ports';

export enum AppointmentNotificationType {
  REQUEST = 'appointment_request',
  STATUS = 'appointment_status',
  RESCHEDULED = 'appointment_rescheduled',
  NURSE_ASSIGNMENT = 'nurse_assignment',
}

const STATUS_LABELS: Record<AppointmentStatus, string> = {
  [AppointmentStatus.PENDING]: 'pendiente',
  [AppointmentStatus.CONFIRMED]: 'confirmado',
  [AppointmentStatus.SCHEDULED]: 'agendado',
  [AppointmentStatus.COMPLETED]: 'completado',
  [AppointmentStatus.CANCELLED]: 'cancelado',
  [AppointmentStatus.DECLINED]: 'rechazado',
};

const STATUS_TITLES: Record<AppointmentStatus, string> = {
  [AppointmentStatus.PENDING]: 'Turno pendiente',
  [AppointmentStatus.CONFIRMED]: 'Turno confirmado',
  [AppointmentStatus.SCHEDULED]: 'Turno agendado',
  [AppointmentStatus.COMPLETED]: 'Turno completado',
  [AppointmentStatus.CANCELLED]: 'Turno cancelado',
  [AppointmentStatus.DECLINED]: 'Turno rechazado',
};

/** "2026-10-19 10:00 UTC" */
export function formatAppointmentDate(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

export function statusLabel(status: AppointmentStatus): string {
  return STATUS_LABELS[status];
}

export function buildRequestNotification(
  appointment: AppointmentRecord,
): NotificationMessage {
  return {
    targetUserId: appointment.doctorId,
    title: 'Nueva solicitud de turno',
    body: `${appointment.patientName} solicitó un turno para el ${formatAppointmentDate(appointment.dateTime)}.`,
    data: notificationData(appointment, AppointmentNotificationType.REQUEST),
  };
}

export function buildStatusNotification(
  appointment: AppointmentRecord,
  targetUserId: string,
): NotificationMessage {
  return {
    targetUserId,
    title: STATUS_TITLES[appointment.status],
    body: `El turno de ${appointment.patientName} con ${appointment.doctorName} del ${formatAppointmentDate(appointment.dateTime)} ahora está ${statusLabel(appointment.status)}.`,
    data: notificationData(appointment, AppointmentNotificationType.STATUS),
  };
}

export function buildRescheduleNotification(
  appointment: AppointmentRecord,
  targetUserId: string,
): NotificationMessage {
  return {
    targetUserId,
    title: 'Turno reprogramado',
    body: `El turno de ${appointment.patientName} con ${appointment.doctorName} se movió al ${formatAppointmentDate(appointment.dateTime)}.`,
    data: notificationData(
      appointment,
      AppointmentNotificationType.RESCHEDULED,
    ),
  };
}

export function buildNurseAssignmentNotification(
  appointment: AppointmentRecord,
  nurseId: string,
): NotificationMessage {
  return {
    targetUserId: nurseId,
    title: 'Nueva asignación',
    body: `Te asignaron el turno de ${appointment.patientName} del ${formatAppointmentDate(appointment.dateTime)}.`,
    data: notificationData(
      appointment,
      AppointmentNotificationType.NURSE_ASSIGNMENT,
    ),
  };
}

function notificationData(
  appointment: AppointmentRecord,
  type: AppointmentNotificationType,
): Record<string, string> {
  return {
    type,
    appointmentId: appointment.id,
    status: appointment.status,
    route: `/appointments/${appointment.id}`,
  };
}
