import { HttpException, HttpStatus } from '@nestjs/common';

export enum AppointmentErrorCode {
  AUTH = 'AUTH_ERROR',
  VALIDATION = 'VALIDATION_ERROR',
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  NOT_FOUND = 'NOT_FOUND',
  STORE = 'STORE_ERROR',
  VERSION_CONFLICT = 'VERSION_CONFLICT',
}

export const STORE_RETRY_MESSAGE =
  'No pudimos guardar los cambios. Intentá de nuevo en unos segundos.';

interface AppointmentErrorOptions {
  cause?: unknown;
}

/**
 * Base de los errores del dominio de turnos.
 *
 * Extienden HttpException para que Nest los responda con el status correcto
 * y un body `{ code, message }` sin filtros extra.
 */
export abstract class AppointmentError extends HttpException {
  protected constructor(
    readonly code: AppointmentErrorCode,
    message: string,
    status: HttpStatus,
    options: AppointmentErrorOptions = {},
  ) {
    super({ code, message }, status, { cause: options.cause });
  }
}

/** Sin sesión, rol incorrecto o el actor no participa del turno. */
export class AuthError extends AppointmentError {
  constructor(message: string, status: HttpStatus = HttpStatus.FORBIDDEN) {
    super(AppointmentErrorCode.AUTH, message, status);
  }
}

export class ValidationError extends AppointmentError {
  constructor(message: string) {
    super(AppointmentErrorCode.VALIDATION, message, HttpStatus.BAD_REQUEST);
  }
}

export class InvalidTransitionError extends AppointmentError {
  constructor(message: string) {
    super(
      AppointmentErrorCode.INVALID_TRANSITION,
      message,
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
  }
}

export class NotFoundError extends AppointmentError {
  constructor(
    message: string,
    readonly resourceId?: string,
  ) {
    super(AppointmentErrorCode.NOT_FOUND, message, HttpStatus.NOT_FOUND);
  }
}

/**
 * Falla de persistencia (timeout, red, driver). El mensaje al usuario es
 * siempre genérico; el detalle queda en `cause` y en los logs.
 */
export class StoreError extends AppointmentError {
  constructor(
    options: AppointmentErrorOptions = {},
    code: AppointmentErrorCode = AppointmentErrorCode.STORE,
    status: HttpStatus = HttpStatus.SERVICE_UNAVAILABLE,
    message: string = STORE_RETRY_MESSAGE,
  ) {
    super(code, message, status, options);
  }
}

/** El turno cambió desde que se leyó (compare-and-swap sobre `version`). */
export class VersionConflictError extends StoreError {
  constructor(
    readonly appointmentId: string,
    readonly expectedVersion: number,
  ) {
    super(
      {},
      AppointmentErrorCode.VERSION_CONFLICT,
      HttpStatus.CONFLICT,
      'El turno fue modificado por otra persona. Actualizá la lista e intentá de nuevo.',
    );
  }
}

/** Solo para logs: una notificación fallida nunca llega al usuario. */
export class NotificationError extends Error {
  constructor(
    message: string,
    readonly targetUserId: string,
    options: AppointmentErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'NotificationError';
  }
}
