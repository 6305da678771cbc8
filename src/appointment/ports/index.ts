// Turnos
export type {
  AppointmentStorePort,
  AppointmentRecord,
  NewAppointmentRecord,
  AppointmentFieldUpdate,
  ParticipantRole,
} from './appointment-store.port';
export { APPOINTMENT_STORE, isParticipantRole } from './appointment-store.port';

// Notificaciones
export type {
  NotificationGatewayPort,
  NotificationMessage,
} from './notification-gateway.port';
export { NOTIFICATION_GATEWAY } from './notification-gateway.port';

// Médicos
export type {
  DoctorDirectoryPort,
  DoctorSummary,
} from './doctor-directory.port';
export { DOCTOR_DIRECTORY } from './doctor-directory.port';

// Usuarios
export type { UserDirectoryPort, UserData } from './user-directory.port';
export { USER_DIRECTORY } from './user-directory.port';
