import { RecommendationStatus, RecommendationType } from '../config';
import { Recommendation } from '../entity/Recommendation';

export interface RecommendationFilter {
  base_product_id?: number;
  recommendation_type?: RecommendationType;
  status?: RecommendationStatus;
  /** Inclusive lower bound on `confidence_score`. */
  min_confidence?: number;
  limit?: number;
}

export interface RecommendationRepository {
  findById(id: number): Promise<Recommendation | null>;
  /** All records of one type, ordered by id. */
  findByType(type: RecommendationType): Promise<Recommendation[]>;
  find(filter: RecommendationFilter): Promise<Recommendation[]>;
  insert(recommendation: Recommendation): Promise<Recommendation>;
  save(recommendations: Recommendation[]): Promise<void>;
  /** Deleting an id that does not exist is not an error. */
  remove(id: number): Promise<void>;
}

export interface RecommendationStore extends RecommendationRepository {
  /**
   * Runs `work` against a transactional view of the store. Everything it
   * saves is committed once when it resolves; if it rejects, or the commit
   * fails, nothing is kept and the error is rethrown.
   */
  transaction<T>(work: (repository: RecommendationRepository) => Promise<T>): Promise<T>;
}
