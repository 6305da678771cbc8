import { isAxiosError } from 'axios';
import type { NotifyUserResponse } from '../types/notify-user-response.type';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * El `catch` puede recibir cualquier cosa; priorizamos el `detail` que
 * devuelve el backend de notificaciones (o su `message`) si vino en la respuesta.
 */
export function extractNotificationErrorMessage(error: unknown): string {
  if (isAxiosError(error)) {
    const responseData: unknown = error.response?.data;

    if (isRecord(responseData)) {
      if (typeof responseData.detail === 'string') {
        return responseData.detail;
      }

      if (typeof responseData.message === 'string') {
        return responseData.message;
      }
    }

    if (typeof error.message === 'string' && error.message.length > 0) {
      return error.message;
    }
  }

  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'Unknown error';
}

/**
 * El backend responde 200 aunque no haya podido entregar a ningún
 * dispositivo; en ese caso informa `success_count: 0`.
 */
export function wasDelivered(response: NotifyUserResponse | undefined): boolean {
  if (!response || typeof response.success_count !== 'number') {
    return true;
  }

  return response.success_count > 0;
}
