import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanFlag = z.enum(['true', 'false']).transform(value => value === 'true');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  TYPEORM_HOST: z.string().min(1).default('localhost'),
  TYPEORM_PORT: z.coerce.number().int().min(1).max(65_535).default(5432),
  TYPEORM_USERNAME: z.string().min(1).default('postgres'),
  TYPEORM_PASSWORD: z.string().default('postgres'),
  TYPEORM_DATABASE: z.string().min(1).default('postgres'),
  TYPEORM_LOGGING: booleanFlag.default('false'),
  TYPEORM_MIGRATIONS_RUN: booleanFlag.default('true'),
});

export type Environment = z.infer<typeof EnvSchema>['NODE_ENV'];
export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export interface DatabaseConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  logging: boolean;
  migrationsRun: boolean;
}

export interface AppConfig {
  env: Environment;
  logLevel: LogLevel;
  server: {
    port: number;
  };
  database: DatabaseConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const values = result.data;
  return {
    env: values.NODE_ENV,
    logLevel: values.LOG_LEVEL,
    server: {
      port: values.PORT,
    },
    database: {
      host: values.TYPEORM_HOST,
      port: values.TYPEORM_PORT,
      username: values.TYPEORM_USERNAME,
      password: values.TYPEORM_PASSWORD,
      database: values.TYPEORM_DATABASE,
      logging: values.TYPEORM_LOGGING,
      migrationsRun: values.TYPEORM_MIGRATIONS_RUN,
    },
  };
}

export const config = loadConfig();
