import {
  AppointmentStatus,
  isAppointmentStatus,
} from '../enums/appointment-status.enum';
import { ValidationError } from '../errors/appointment.errors';
import type { RequestAppointmentInput } from '../appointment.service';

export type AppointmentRequestBody = Omit<RequestAppointmentInput, 'patientId'>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireBody(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new ValidationError('El cuerpo del pedido tiene que ser un objeto JSON.');
  }

  return body;
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`El campo "${field}" es obligatorio.`);
  }

  return value.trim();
}

// Fechas en ISO-8601 ("2026-10-19T10:00:00Z")
function requireDate(value: unknown, field: string): Date {
  if (typeof value !== 'string') {
    throw new ValidationError(`El campo "${field}" tiene que ser una fecha ISO.`);
  }

  const date = new Date(value);

  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`El campo "${field}" no es una fecha válida.`);
  }

  return date;
}

/** POST /appointments */
export function parseRequestAppointmentBody(
  body: unknown,
): AppointmentRequestBody {
  const { doctorId, reason, dateTime, notes } = requireBody(body);

  // `reason` vacío o con espacios se rechaza en el servicio
  if (typeof reason !== 'string') {
    throw new ValidationError('El campo "reason" es obligatorio.');
  }

  if (notes !== undefined && notes !== null && typeof notes !== 'string') {
    throw new ValidationError('El campo "notes" tiene que ser texto.');
  }

  return {
    doctorId: requireString(doctorId, 'doctorId'),
    reason,
    dateTime: requireDate(dateTime, 'dateTime'),
    notes: notes ?? null,
  };
}

/** PATCH /appointments/:id/status */
export function parseStatusBody(body: unknown): AppointmentStatus {
  const { status } = requireBody(body);

  if (!isAppointmentStatus(status)) {
    throw new ValidationError(
      `Estado inválido. Valores posibles: ${Object.values(AppointmentStatus).join(', ')}.`,
    );
  }

  return status;
}

/** PATCH /appointments/:id/schedule */
export function parseRescheduleBody(body: unknown): Date {
  return requireDate(requireBody(body).dateTime, 'dateTime');
}

/** PATCH /appointments/:id/nurse; `null` quita la asignación */
export function parseNurseAssignmentBody(body: unknown): string | null {
  const { nurseId } = requireBody(body);

  if (nurseId === undefined) {
    throw new ValidationError('El campo "nurseId" es obligatorio.');
  }

  return nurseId === null ? null : requireString(nurseId, 'nurseId');
}

/** `?status=` del listado. Ausente o vacío significa todos. */
export function parseStatusFilter(
  value: unknown,
): AppointmentStatus | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }

  if (!isAppointmentStatus(value)) {
    throw new ValidationError(`Filtro de estado inválido: ${String(value)}.`);
  }

  return value;
}
