import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { NOTIFICATION_GATEWAY } from '../appointment/ports';
import type {
  NotificationGatewayPort,
  NotificationMessage,
} from '../appointment/ports';
import { NotificationError } from '../appointment/errors/appointment.errors';

/**
 * Hook post-commit para notificaciones.
 *
 * `dispatch` no espera la entrega: la operación que lo llama ya terminó su
 * escritura. Las fallas se loguean y no se reintentan.
 */
@Injectable()
export class NotificationDispatcher implements OnModuleDestroy {
  private readonly logger = new Logger(NotificationDispatcher.name);
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    @Inject(NOTIFICATION_GATEWAY)
    private readonly gateway: NotificationGatewayPort,
  ) {}

  dispatch(message: NotificationMessage): void {
    const delivery: Promise<void> = this.deliver(message).finally(() => {
      this.inFlight.delete(delivery);
    });

    this.inFlight.add(delivery);
  }

  /** Espera las entregas pendientes (apagado ordenado y tests). */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.inFlight.size > 0) {
      this.logger.log(
        `⏳ Esperando ${this.inFlight.size} notificaciones pendientes`,
      );
    }
    await this.drain();
  }

  private async deliver(message: NotificationMessage): Promise<void> {
    try {
      const delivered = await this.gateway.send(message);

      if (!delivered) {
        this.logger.warn(
          `Notificación "${message.title}" no entregada a ${message.targetUserId}`,
        );
      }
    } catch (error: unknown) {
      const failure = new NotificationError(
        `Fallo al notificar a ${message.targetUserId}`,
        message.targetUserId,
        { cause: error },
      );
      const detail = error instanceof Error ? error.message : String(error);

      this.logger.error(`${failure.message}: ${detail}`, failure.stack);
    }
  }
}
