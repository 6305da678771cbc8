export enum UserRole {
  PATIENT = 'patient',
  DOCTOR = 'doctor',
  NURSE = 'nurse',
  ADMIN = 'admin',
  UNKNOWN = 'unknown', // Sin sesión o rol no asignado
}

/**
 * Convierte el rol guardado (texto libre) al enum. Cualquier valor
 * desconocido cae en UNKNOWN, que el core trata como no autenticado.
 */
export function parseUserRole(value: unknown): UserRole {
  if (typeof value !== 'string') {
    return UserRole.UNKNOWN;
  }

  switch (value.trim().toLowerCase()) {
    case 'patient':
      return UserRole.PATIENT;
    case 'doctor':
      return UserRole.DOCTOR;
    case 'nurse':
      return UserRole.NURSE;
    case 'admin':
      return UserRole.ADMIN;
    default:
      return UserRole.UNKNOWN;
  }
}
