export enum AppointmentStatus {
  PENDING = 'pending', // El paciente lo pidió, falta que el médico responda
  CONFIRMED = 'confirmed', // El médico lo aprobó
  SCHEDULED = 'scheduled', // Logística confirmada (médico o enfermería)
  COMPLETED = 'completed', // El turno ocurrió
  CANCELLED = 'cancelled', // El paciente lo canceló
  DECLINED = 'declined', // El médico lo rechazó
}

const STATUS_VALUES: readonly string[] = Object.values(AppointmentStatus);

export function isAppointmentStatus(value: unknown): value is AppointmentStatus {
  return typeof value === 'string' && STATUS_VALUES.includes(value);
}

/**
 * Decodifica el estado leído desde la base. Nulos o valores desconocidos
 * caen en PENDING, nunca en un estado terminal, para no perder el registro.
 */
export function parseAppointmentStatus(value: unknown): AppointmentStatus {
  if (typeof value !== 'string') {
    return AppointmentStatus.PENDING;
  }

  const normalized = value.trim().toLowerCase();

  return isAppointmentStatus(normalized)
    ? normalized
    : AppointmentStatus.PENDING;
}
