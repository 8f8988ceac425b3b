import { createApp } from './app';
import { config } from './config';
import { AppDataSource } from './data-source';
import { logger } from './logger';
import { TypeOrmRecommendationStore } from './modules/recommendations';

AppDataSource.initialize()
  .then(() => {
    logger.info({ database: config.database.database }, 'Database connection established');

    const app = createApp(new TypeOrmRecommendationStore(AppDataSource.manager));
    app.listen(config.server.port, () => {
      logger.info({ port: config.server.port }, 'Recommendation service listening');
    });
  })
  .catch((error: Error) => {
    logger.fatal({ err: error }, 'Failed to connect to the database');
    process.exit(1);
  });
