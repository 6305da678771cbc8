import type { ConfigService } from '@nestjs/config';
import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { resolveStoreTimeoutMs } from './database.utils';

export function buildTypeOrmOptions(
  configService: ConfigService,
): TypeOrmModuleOptions {
  const storeTimeoutMs = resolveStoreTimeoutMs(configService);

  return {
    type: 'postgres',
    host: configService.get<string>('DB_HOST'),
    port: parseInt(configService.get<string>('DB_PORT') ?? '5432', 10),
    username: configService.get<string>('DB_USERNAME'),
    password: configService.get<string>('DB_PASSWORD'),
    database: configService.get<string>('DB_NAME'),
    autoLoadEntities: true,
    synchronize: false,
    migrationsRun: false,
    // Mismo tope que el service: una escritura que vence se cancela en
    // Postgres y no puede confirmarse después del StoreError
    extra: {
      statement_timeout: storeTimeoutMs,
      query_timeout: storeTimeoutMs,
    },
    ssl:
      configService.get<string>('DB_SSL') === 'true'
        ? {
            rejectUnauthorized:
              configService.get<string>('NODE_ENV') === 'production',
          }
        : false,
  };
}
