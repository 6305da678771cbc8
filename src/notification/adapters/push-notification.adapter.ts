import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { lastValueFrom } from 'rxjs';
import type {
  NotificationGatewayPort,
  NotificationMessage,
} from '../../appointment/ports';
import type { NotifyUserResponse } from '../types/notify-user-response.type';
import {
  extractNotificationErrorMessage,
  wasDelivered,
} from '../utils/notification.utils';

const DEFAULT_NOTIFICATION_TIMEOUT_MS = 15_000;

/**
 * Adaptador: envía push a través del backend de notificaciones (FCM) usando
 * HttpService (Axios). Nunca lanza: los errores se loguean y se devuelve false.
 */
@Injectable()
export class PushNotificationAdapter implements NotificationGatewayPort {
  private readonly logger = new Logger(PushNotificationAdapter.name);
  private readonly timeoutMs: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly httpService: HttpService,
  ) {
    this.timeoutMs = parseInt(
      this.configService.get<string>('NOTIFICATION_TIMEOUT_MS') ??
        String(DEFAULT_NOTIFICATION_TIMEOUT_MS),
      10,
    );
  }

  async send(message: NotificationMessage): Promise<boolean> {
    const baseUrl = this.configService.get<string>('NOTIFICATION_API_URL');

    if (!baseUrl) {
      this.logger.warn(
        `NOTIFICATION_API_URL no está configurado. Se descarta la notificación para ${message.targetUserId}.`,
      );
      return false;
    }

    const token = this.configService.get<string>('NOTIFICATION_API_TOKEN');
    const url = `${baseUrl.replace(/\/+$/, '')}/notify-user`;
    const data = {
      user_id: message.targetUserId,
      title: message.title,
      body: message.body,
      data: message.data,
    };
    const headers = {
      ...(token ? { Authorization: `Bearer ${token}` } : {}),
      'Content-Type': 'application/json',
    };

    try {
      const response = await lastValueFrom(
        this.httpService.post<NotifyUserResponse>(url, data, {
          headers,
          timeout: this.timeoutMs,
        }),
      );

      if (!wasDelivered(response.data)) {
        this.logger.warn(
          `⚠️ El backend no encontró dispositivos para ${message.targetUserId}`,
        );
        return false;
      }

      this.logger.log(`✅ Notificación enviada a ${message.targetUserId}`);
      return true;
    } catch (error: unknown) {
      const errorMessage = extractNotificationErrorMessage(error);

      this.logger.error(`❌ Error enviando notificación: ${errorMessage}`);
      return false;
    }
  }
}
