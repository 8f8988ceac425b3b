import type Decimal from 'decimal.js';

import { ValidationError } from '../../../errors';
import { PRICE_FIELDS, PriceField, RECOMMENDATIONS_CONFIG } from '../config';
import { validatePercentage } from '../service/pricing';

export type PriceDiscounts = Partial<Record<PriceField, Decimal>>;

export interface CustomDiscountEntry {
  id: number;
  discounts: PriceDiscounts;
}

export interface FlatDiscountResult {
  updatedIds: number[];
  count: number;
}

export interface FlatDiscountResponse {
  message: string;
  updated_count: number;
  updated_ids: number[];
}

export interface CustomDiscountResponse {
  message: string;
  updated_ids: number[];
}

const RECOMMENDATION_ID_PATTERN = /^\s*[+-]?\d+\s*$/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseRecommendationIdKey(key: string): number {
  const id = RECOMMENDATION_ID_PATTERN.test(key) ? Number.parseInt(key, 10) : Number.NaN;
  if (!Number.isSafeInteger(id)) {
    throw new ValidationError(RECOMMENDATIONS_CONFIG.MESSAGES.MAPPING_KEYS);
  }
  return id;
}

/**
 * Checks the shape of a whole `{ "<id>": { <price field>: <percent> } }`
 * mapping and returns its entries in iteration order. Any malformed entry
 * rejects the whole mapping.
 */
export function parseCustomDiscounts(mapping: unknown): CustomDiscountEntry[] {
  const { MESSAGES } = RECOMMENDATIONS_CONFIG;

  if (!isPlainObject(mapping) || Object.keys(mapping).length === 0) {
    throw new ValidationError(MESSAGES.MAPPING_SHAPE);
  }

  return Object.entries(mapping).map(([key, config]) => {
    const id = parseRecommendationIdKey(key);

    if (!isPlainObject(config) || Object.keys(config).length === 0) {
      throw new ValidationError(MESSAGES.MAPPING_VALUES);
    }

    const fields = PRICE_FIELDS.filter(field => Object.hasOwn(config, field));
    if (fields.length === 0) {
      throw new ValidationError(MESSAGES.MAPPING_FIELDS);
    }

    const discounts: PriceDiscounts = {};
    for (const field of fields) {
      discounts[field] = validatePercentage(config[field]);
    }

    return { id, discounts };
  });
}
