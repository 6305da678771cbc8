import { UserRole } from '../../user/enums/user-role.enum';

/**
 * Puerto de salida: identidad de usuarios (nombre y rol).
 */
export interface UserDirectoryPort {
  findById(userId: string): Promise<UserData | null>;
}

export interface UserData {
  id: string;
  name: string;
  role: UserRole;
  isActive: boolean;
}

export const USER_DIRECTORY = Symbol('USER_DIRECTORY');
