import path from 'node:path';

import express, { Express, Request, Response } from 'express';

import { errorHandler, notFoundHandler } from './http/respond';
import { createRecommendationRouter } from './modules/recommendations';
import type { RecommendationStore } from './modules/recommendations';

const RECOMMENDATION_PATHS = ['/recommendations', '/api/recommendations'];

export function createApp(store: RecommendationStore): Express {
  const app = express();

  app.use(express.static(path.join(__dirname, 'public')));

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'OK' });
  });

  app.get('/', (_req: Request, res: Response) => {
    res.status(200).json({
      name: 'Recommendation REST API Service',
      version: '1.0',
      paths: RECOMMENDATION_PATHS,
    });
  });

  app.get('/ui', (_req: Request, res: Response) => {
    res.sendFile(path.join(__dirname, 'public', 'index.html'));
  });

  app.use(RECOMMENDATION_PATHS, createRecommendationRouter(store));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
