import { UserRole } from '../user/enums/user-role.enum';

/** Identidad autenticada que ejecuta una operación. */
export interface Actor {
  userId: string;
  role: UserRole;
}

export const ANONYMOUS_ACTOR: Actor = Object.freeze({
  userId: '',
  role: UserRole.UNKNOWN,
});
