import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { HttpModule } from '@nestjs/axios';
import { NOTIFICATION_GATEWAY } from '../appointment/ports';
import { PushNotificationAdapter } from './adapters/push-notification.adapter';
import { NotificationDispatcher } from './notification.dispatcher';

@Module({
  imports: [ConfigModule, HttpModule],
  providers: [
    NotificationDispatcher,
    {
      provide: NOTIFICATION_GATEWAY,
      useClass: PushNotificationAdapter,
    },
  ],
  exports: [NotificationDispatcher],
})
export class NotificationModule {}
