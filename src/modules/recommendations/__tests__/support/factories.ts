import { RECOMMENDATION_STATUSES, RECOMMENDATION_TYPES } from '../../config';
import { Recommendation } from '../../entity/Recommendation';

export const CREATED_AT = new Date('2024-01-01T00:00:00.000Z');

let sequence = 0;

/**
 * Unsaved recommendation with predictable values; types and statuses cycle
 * through their allowed values.
 */
export function buildRecommendation(overrides: Partial<Recommendation> = {}): Recommendation {
  const n = sequence++;
  return Object.assign(new Recommendation(), {
    base_product_id: 100 + n,
    recommended_product_id: 200 + n,
    recommendation_type: RECOMMENDATION_TYPES[n % RECOMMENDATION_TYPES.length],
    status: RECOMMENDATION_STATUSES[n % RECOMMENDATION_STATUSES.length],
    confidence_score: '0.50',
    base_product_price: '10.00',
    recommended_product_price: '5.00',
    base_product_description: `Base product ${n}`,
    recommended_product_description: `Recommended product ${n}`,
    created_date: CREATED_AT,
    updated_date: CREATED_AT,
  }, overrides);
}
