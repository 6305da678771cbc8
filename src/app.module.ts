import { Module } from '@nestjs/common';
import { CacheModule } from '@nestjs/cache-manager';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AppointmentModule } from './appointment/appointment.module';
import { UserModule } from './user/user.module';
import { buildTypeOrmOptions } from './database/typeorm-options.factory';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    // Cache en memoria para lookups de usuarios (nombre y rol)
    CacheModule.register({
      isGlobal: true,
      ttl: 5 * 60 * 1000, // 5 minutos por defecto
      max: 1000, // Máximo 1000 entradas en cache
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: buildTypeOrmOptions,
    }),
    UserModule,
    AppointmentModule,
  ],
})
export class AppModule {}
