/**
 * Puerto de salida: entrega de notificaciones push a un usuario.
 *
 * Los reintentos, si los hay, son responsabilidad de la implementación.
 */
export interface NotificationGatewayPort {
  /** `true` si el backend aceptó el mensaje. */
  send(message: NotificationMessage): Promise<boolean>;
}

export interface NotificationMessage {
  targetUserId: string;
  title: string;
  body: string;
  data: Record<string, string>; // FCM solo acepta strings
}

export const NOTIFICATION_GATEWAY = Symbol('NOTIFICATION_GATEWAY');
