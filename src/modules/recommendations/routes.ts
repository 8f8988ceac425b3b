import express, { NextFunction, Request, Response, Router } from 'express';

import { DiscountController } from './controller/DiscountController';
import { RecommendationController } from './controller/RecommendationController';
import { DiscountService } from './service/DiscountService';
import { RecommendationService } from './service/RecommendationService';
import { RecommendationStore } from './store/RecommendationStore';

const parseJson = express.json();

// a flat discount never reads the body, so a malformed one must not reject it
function parseJsonUnlessFlatDiscount(req: Request, res: Response, next: NextFunction): void {
  if (req.query.discount !== undefined) {
    next();
    return;
  }
  parseJson(req, res, next);
}

export function createRecommendationRouter(store: RecommendationStore): Router {
  const router = Router();
  const recommendationController = new RecommendationController(new RecommendationService(store));
  const discountController = new DiscountController(new DiscountService(store));

  // registered before /:id so the literal path wins
  router.put('/apply_discount', parseJsonUnlessFlatDiscount, (req, res) => discountController.applyDiscount(req, res));

  router.get('/', (req, res) => recommendationController.list(req, res));
  router.post('/', parseJson, (req, res) => recommendationController.create(req, res));
  router.get('/:id', (req, res) => recommendationController.get(req, res));
  router.put('/:id', parseJson, (req, res) => recommendationController.update(req, res));
  router.delete('/:id', (req, res) => recommendationController.delete(req, res));

  return router;
}
