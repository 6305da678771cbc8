import type { NotificationGatewayPort, NotificationMessage } from '../ports';

/** Gateway falso: guarda lo que se envía y permite simular fallas. */
export class RecordingNotificationGateway implements NotificationGatewayPort {
  readonly sent: NotificationMessage[] = [];
  failure: Error | null = null;
  delivered = true;

  async send(message: NotificationMessage): Promise<boolean> {
    if (this.failure) {
      throw this.failure;
    }

    this.sent.push(message);
    return this.delivered;
  }
}
