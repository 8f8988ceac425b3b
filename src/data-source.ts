import 'reflect-metadata';
import path from 'node:path';

import { DataSource } from 'typeorm';

import { config } from './config';

const { database } = config;

export const AppDataSource = new DataSource({
  type: 'postgres',
  host: database.host,
  port: database.port,
  username: database.username,
  password: database.password,
  database: database.database,
  synchronize: false,
  migrationsRun: database.migrationsRun,
  logging: database.logging,
  entities: [path.join(__dirname, './**/entity/**/*.{ts,js}')],
  migrations: [path.join(__dirname, './migration/*.{ts,js}')],
});
