import type { ConfigService } from '@nestjs/config';

/** Tope por defecto de cada llamada a persistencia */
export const DEFAULT_STORE_TIMEOUT_MS = 15_000;

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// Postgres rechaza con 22P02 un id que no es uuid; para el dominio es "no existe"
export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

/**
 * Lee STORE_TIMEOUT_MS. Lo usan el service (corte del lado de Node) y el
 * pool de Postgres (corte de la consulta en el servidor).
 */
export function resolveStoreTimeoutMs(configService: ConfigService): number {
  const configured = parseInt(
    configService.get<string>('STORE_TIMEOUT_MS') ??
      String(DEFAULT_STORE_TIMEOUT_MS),
    10,
  );

  return Number.isFinite(configured) && configured > 0
    ? configured
    : DEFAULT_STORE_TIMEOUT_MS;
}
