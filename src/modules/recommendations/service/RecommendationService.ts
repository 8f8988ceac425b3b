import { NotFoundError, ValidationError } from '../../../errors';
import { createLogger } from '../../../logger';
import {
  RECOMMENDATIONS_CONFIG,
  UPDATABLE_FIELDS,
  isRecommendationStatus,
  isRecommendationType,
  recommendationNotFoundMessage,
} from '../config';
import {
  CreateRecommendationSchema,
  ListRecommendationsQuerySchema,
  UpdateRecommendationSchema,
  parseWith,
} from '../dto/recommendation.dto';
import { Recommendation } from '../entity/Recommendation';
import { RecommendationFilter, RecommendationStore } from '../store/RecommendationStore';

export class RecommendationService {
    private readonly logger = createLogger('recommendation-service');

    constructor(
        private readonly store: RecommendationStore,
        private readonly now: () => Date = () => new Date(),
    ) {}

    async create(payload: unknown): Promise<Recommendation> {
      const data = parseWith(CreateRecommendationSchema, payload, 'Invalid Recommendation');

      const recommendation = new Recommendation();
      Object.assign(recommendation, data);
      const stamp = this.now();
      recommendation.created_date = stamp;
      recommendation.updated_date = stamp;

      this.logger.info(
        { base_product_id: data.base_product_id, recommended_product_id: data.recommended_product_id },
        'Creating recommendation',
      );
      return this.persist('create', () => this.store.insert(recommendation));
    }

    async get(id: number): Promise<Recommendation> {
      this.logger.debug({ id }, 'Looking up recommendation');
      const recommendation = await this.store.findById(id);
      if (!recommendation) {
        throw new NotFoundError(recommendationNotFoundMessage(id));
      }
      return recommendation;
    }

    /**
     * Updates the editable fields (type, status, confidence score). Enum values
     * are trimmed and lowercased; any other field is rejected.
     */
    async update(id: number, payload: unknown): Promise<Recommendation> {
      const recommendation = await this.get(id);
      const { MESSAGES } = RECOMMENDATIONS_CONFIG;

      if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
        throw new ValidationError(MESSAGES.BODY_NOT_OBJECT);
      }
      const fields = Object.keys(payload);
      if (fields.length === 0) {
        throw new ValidationError(MESSAGES.EMPTY_UPDATE);
      }
      const unknownField = fields.find(field => !UPDATABLE_FIELDS.some(allowed => allowed === field));
      if (unknownField !== undefined) {
        throw new ValidationError(`Unknown field: ${unknownField}`);
      }

      const changes = parseWith(UpdateRecommendationSchema, payload, 'Invalid update');
      if (changes.recommendation_type !== undefined) {
        recommendation.recommendation_type = changes.recommendation_type;
      }
      if (changes.status !== undefined) {
        recommendation.status = changes.status;
      }
      if (changes.confidence_score !== undefined) {
        recommendation.confidence_score = changes.confidence_score;
      }
      recommendation.updated_date = this.now();

      this.logger.info({ id, fields }, 'Updating recommendation');
      await this.persist('update', () => this.store.save([recommendation]));
      return recommendation;
    }

    async delete(id: number): Promise<void> {
      this.logger.info({ id }, 'Deleting recommendation');
      await this.persist('delete', () => this.store.remove(id));
    }

    /**
     * Filters are AND-ed together. An unknown type or status matches nothing.
     */
    async list(rawQuery: unknown): Promise<Recommendation[]> {
      const query = parseWith(ListRecommendationsQuerySchema, rawQuery, 'Invalid query');
      const filter: RecommendationFilter = {
        base_product_id: query.base_product_id,
        min_confidence: query.confidence_score,
        limit: Math.max(1, query.quantity ?? RECOMMENDATIONS_CONFIG.DEFAULT_LIST_QUANTITY),
      };

      if (query.recommendation_type !== undefined) {
        if (!isRecommendationType(query.recommendation_type)) {
          return [];
        }
        filter.recommendation_type = query.recommendation_type;
      }
      if (query.status !== undefined) {
        if (!isRecommendationStatus(query.status)) {
          return [];
        }
        filter.status = query.status;
      }

      const recommendations = await this.store.find(filter);
      this.logger.info({ filter, count: recommendations.length }, 'Listed recommendations');
      return recommendations;
    }

    private async persist<T>(operation: string, write: () => Promise<T>): Promise<T> {
      try {
        return await write();
      } catch (error) {
        this.logger.error({ err: error, operation }, 'Recommendation write failed');
        const reason = error instanceof Error ? error.message : String(error);
        throw new ValidationError(reason, { cause: error });
      }
    }
}
