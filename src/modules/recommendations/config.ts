export const RECOMMENDATION_TYPES = ['cross-sell', 'up-sell', 'accessory'] as const;
export type RecommendationType = typeof RECOMMENDATION_TYPES[number];

export const RECOMMENDATION_STATUSES = ['active', 'inactive'] as const;
export type RecommendationStatus = typeof RECOMMENDATION_STATUSES[number];

export const PRICE_FIELDS = ['base_product_price', 'recommended_product_price'] as const;
export type PriceField = typeof PRICE_FIELDS[number];

export const UPDATABLE_FIELDS = ['recommendation_type', 'status', 'confidence_score'] as const;

export function isRecommendationType(value: string): value is RecommendationType {
  return RECOMMENDATION_TYPES.some(type => type === value);
}

export function isRecommendationStatus(value: string): value is RecommendationStatus {
  return RECOMMENDATION_STATUSES.some(status => status === value);
}

export const RECOMMENDATIONS_CONFIG = {
  DEFAULT_LIST_QUANTITY: 10,
  DESCRIPTION_MAX_LENGTH: 1023,
  PRICE_SCALE: 2,
  CONFIDENCE_SCALE: 2,
  FLAT_DISCOUNT_TYPE: 'accessory',
  MESSAGES: {
    DISCOUNT_RANGE: 'Discount must be between 0 and 100',
    DISCOUNT_INPUT_REQUIRED: 'A discount query parameter or a JSON body is required',
    NO_ACCESSORIES: 'No matching accessory recommendations found',
    NO_DISCOUNTABLE_ACCESSORIES: 'No accessory recommendations with prices to discount',
    MAPPING_SHAPE: 'JSON body must map recommendation_id to discount objects',
    MAPPING_KEYS: 'Keys must be numeric recommendation IDs',
    MAPPING_VALUES: 'Each value must be an object with price discount fields',
    MAPPING_FIELDS: 'Provide at least one of base_product_price or recommended_product_price',
    EMPTY_UPDATE: 'Request body must contain at least one field to update',
    BODY_NOT_OBJECT: 'Request body must be a JSON object',
  },
} as const;

export function recommendationNotFoundMessage(id: number | string): string {
  return `Recommendation with id '${id}' was not found.`;
}
