import type Decimal from 'decimal.js';
import { z } from 'zod';

import { ValidationError } from '../../../errors';
import {
  RECOMMENDATION_STATUSES,
  RECOMMENDATION_TYPES,
  RECOMMENDATIONS_CONFIG,
  RecommendationStatus,
  RecommendationType,
} from '../config';
import { Recommendation } from '../entity/Recommendation';
import { parseDecimal, toFixedDecimal } from '../service/pricing';

const decimalInput = z.union([z.number(), z.string()]).transform((value, ctx): Decimal => {
  const parsed = parseDecimal(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be numeric' });
    return z.NEVER;
  }
  return parsed;
});

const recommendationTypeSchema = z.string().trim().toLowerCase().pipe(z.enum(RECOMMENDATION_TYPES));
const statusSchema = z.string().trim().toLowerCase().pipe(z.enum(RECOMMENDATION_STATUSES));

const confidenceScoreSchema = decimalInput
  .refine(value => value.gte(0) && value.lte(1), {
    message: 'must be in [0, 1]',
  })
  .transform(value => toFixedDecimal(value, RECOMMENDATIONS_CONFIG.CONFIDENCE_SCALE));

const priceSchema = decimalInput
  .refine(value => value.gte(0), { message: 'must not be negative' })
  .transform(value => toFixedDecimal(value, RECOMMENDATIONS_CONFIG.PRICE_SCALE))
  .nullable()
  .optional()
  .transform(value => value ?? null);

const descriptionSchema = z.string()
  .max(RECOMMENDATIONS_CONFIG.DESCRIPTION_MAX_LENGTH)
  .nullable()
  .optional()
  .transform(value => value ?? null);

export const CreateRecommendationSchema = z.object({
  base_product_id: z.number().int(),
  recommended_product_id: z.number().int(),
  recommendation_type: recommendationTypeSchema,
  status: statusSchema.default('active'),
  confidence_score: confidenceScoreSchema,
  base_product_price: priceSchema,
  recommended_product_price: priceSchema,
  base_product_description: descriptionSchema,
  recommended_product_description: descriptionSchema,
});
export type CreateRecommendationInput = z.infer<typeof CreateRecommendationSchema>;

export const UpdateRecommendationSchema = z.object({
  recommendation_type: recommendationTypeSchema,
  status: statusSchema,
  confidence_score: confidenceScoreSchema,
}).partial();
export type UpdateRecommendationInput = z.infer<typeof UpdateRecommendationSchema>;

const optionalFilter = z.string().trim().toLowerCase().optional().transform(value => value || undefined);

export const ListRecommendationsQuerySchema = z.object({
  base_product_id: z.coerce.number().int().optional(),
  recommendation_type: optionalFilter,
  status: optionalFilter,
  confidence_score: z.coerce.number()
    .min(0, { message: 'must be in [0, 1]' })
    .max(1, { message: 'must be in [0, 1]' })
    .optional(),
  quantity: z.coerce.number().int().optional(),
});
export type ListRecommendationsQuery = z.infer<typeof ListRecommendationsQuerySchema>;

export function parseWith<T extends z.ZodTypeAny>(schema: T, payload: unknown, context: string): z.output<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`${context}: ${problems}`);
  }
  return result.data;
}

export interface RecommendationResponse {
  recommendation_id: number;
  base_product_id: number;
  recommended_product_id: number;
  recommendation_type: RecommendationType;
  status: RecommendationStatus;
  confidence_score: number;
  base_product_price: number | null;
  recommended_product_price: number | null;
  base_product_description: string | null;
  recommended_product_description: string | null;
  created_date: string;
  updated_date: string;
}

function toNumber(value: string | null): number | null {
  return value === null ? null : Number(value);
}

export function serializeRecommendation(recommendation: Recommendation): RecommendationResponse {
  return {
    recommendation_id: recommendation.id,
    base_product_id: recommendation.base_product_id,
    recommended_product_id: recommendation.recommended_product_id,
    recommendation_type: recommendation.recommendation_type,
    status: recommendation.status,
    confidence_score: Number(recommendation.confidence_score),
    base_product_price: toNumber(recommendation.base_product_price),
    recommended_product_price: toNumber(recommendation.recommended_product_price),
    base_product_description: recommendation.base_product_description,
    recommended_product_description: recommendation.recommended_product_description,
    created_date: recommendation.created_date.toISOString(),
    updated_date: recommendation.updated_date.toISOString(),
  };
}
