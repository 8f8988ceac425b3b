export * from './config';
export { Recommendation } from './entity/Recommendation';
export { DiscountController } from './controller/DiscountController';
export { RecommendationController } from './controller/RecommendationController';
export { DiscountService } from './service/DiscountService';
export { RecommendationService } from './service/RecommendationService';
export type { RecommendationRepository, RecommendationStore, RecommendationFilter } from './store/RecommendationStore';
export { TypeOrmRecommendationStore } from './store/TypeOrmRecommendationStore';
export { createRecommendationRouter } from './routes';
