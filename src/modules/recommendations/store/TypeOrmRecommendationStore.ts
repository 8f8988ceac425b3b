import { EntityManager } from 'typeorm';

import { RecommendationType } from '../config';
import { Recommendation } from '../entity/Recommendation';
import { RecommendationFilter, RecommendationRepository, RecommendationStore } from './RecommendationStore';

export class TypeOrmRecommendationStore implements RecommendationStore {
    constructor(private readonly manager: EntityManager) {}

    async findById(id: number): Promise<Recommendation | null> {
      return this.manager.findOne(Recommendation, { where: { id } });
    }

    async findByType(type: RecommendationType): Promise<Recommendation[]> {
      return this.manager.find(Recommendation, {
        where: { recommendation_type: type },
        order: { id: 'ASC' },
      });
    }

    async find(filter: RecommendationFilter): Promise<Recommendation[]> {
      const query = this.manager
        .createQueryBuilder(Recommendation, 'recommendation')
        .orderBy('recommendation.id', 'ASC');

      if (filter.base_product_id !== undefined) {
        query.andWhere('recommendation.base_product_id = :baseProductId', { baseProductId: filter.base_product_id });
      }
      if (filter.recommendation_type !== undefined) {
        query.andWhere('recommendation.recommendation_type = :type', { type: filter.recommendation_type });
      }
      if (filter.status !== undefined) {
        query.andWhere('recommendation.status = :status', { status: filter.status });
      }
      if (filter.min_confidence !== undefined) {
        query.andWhere('recommendation.confidence_score >= :minConfidence', { minConfidence: filter.min_confidence });
      }
      if (filter.limit !== undefined) {
        query.take(filter.limit);
      }

      return query.getMany();
    }

    async insert(recommendation: Recommendation): Promise<Recommendation> {
      return this.manager.save(Recommendation, recommendation);
    }

    async save(recommendations: Recommendation[]): Promise<void> {
      await this.manager.save(Recommendation, recommendations);
    }

    async remove(id: number): Promise<void> {
      await this.manager.delete(Recommendation, { id });
    }

    async transaction<T>(work: (repository: RecommendationRepository) => Promise<T>): Promise<T> {
      return this.manager.transaction(manager => work(new TypeOrmRecommendationStore(manager)));
    }
}
