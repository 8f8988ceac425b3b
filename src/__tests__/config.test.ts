import { describe, test, expect } from '@jest/globals';

import { loadConfig } from '../config';

describe('loadConfig', () => {
  test('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      env: 'development',
      logLevel: 'info',
      server: { port: 8080 },
      database: {
        host: 'localhost',
        port: 5432,
        username: 'postgres',
        password: 'postgres',
        database: 'postgres',
        logging: false,
        migrationsRun: true,
      },
    });
  });

  test('reads values from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '3000',
      LOG_LEVEL: 'debug',
      TYPEORM_HOST: 'db',
      TYPEORM_PORT: '6543',
      TYPEORM_USERNAME: 'shop',
      TYPEORM_PASSWORD: 'test-secret',
      TYPEORM_DATABASE: 'recommendations',
      TYPEORM_LOGGING: 'true',
      TYPEORM_MIGRATIONS_RUN: 'false',
    });

    expect(config.env).toBe('production');
    expect(config.server.port).toBe(3000);
    expect(config.logLevel).toBe('debug');
    expect(config.database).toEqual({
      host: 'db',
      port: 6543,
      username: 'shop',
      password: 'test-secret',
      database: 'recommendations',
      logging: true,
      migrationsRun: false,
    });
  });

  test('names every invalid variable', () => {
    expect(() => loadConfig({ PORT: 'http', TYPEORM_LOGGING: 'yes' })).toThrow(
      /^Invalid configuration: PORT: .+; TYPEORM_LOGGING: /,
    );
  });

  test('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });
});
