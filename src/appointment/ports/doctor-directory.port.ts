/**
 * Puerto de salida: catálogo de médicos habilitados.
 */
export interface DoctorDirectoryPort {
  exists(doctorId: string): Promise<boolean>;
  listAvailable(specialty?: string): Promise<DoctorSummary[]>;
}

export interface DoctorSummary {
  id: string;
  name: string;
  specialty: string | null;
}

export const DOCTOR_DIRECTORY = Symbol('DOCTOR_DIRECTORY');
