import { ConfigService } from '@nestjs/config';
import { buildTypeOrmOptions } from './typeorm-options.factory';

describe('buildTypeOrmOptions', () => {
  it('pasa el timeout del store al driver de Postgres', () => {
    const options = buildTypeOrmOptions(
      new ConfigService({ STORE_TIMEOUT_MS: '2500', DB_PORT: '6543' }),
    );

    expect(options).toMatchObject({
      type: 'postgres',
      port: 6543,
      extra: { statement_timeout: 2500, query_timeout: 2500 },
      ssl: false,
    });
  });

  it('usa 15s si STORE_TIMEOUT_MS falta o no es válido', () => {
    const options = buildTypeOrmOptions(
      new ConfigService({ STORE_TIMEOUT_MS: 'nunca' }),
    );

    expect(options).toMatchObject({
      port: 5432,
      extra: { statement_timeout: 15_000, query_timeout: 15_000 },
    });
  });
});
