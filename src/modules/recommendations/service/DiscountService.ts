import { ServiceError, NotFoundError, ValidationError } from '../../../errors';
import { createLogger } from '../../../logger';
import { PRICE_FIELDS, RECOMMENDATIONS_CONFIG } from '../config';
import { FlatDiscountResult, PriceDiscounts, parseCustomDiscounts } from '../dto/discount.dto';
import { Recommendation } from '../entity/Recommendation';
import { RecommendationRepository, RecommendationStore } from '../store/RecommendationStore';
import { applyPercentDiscount, validatePercentage } from './pricing';

/**
 * Bulk price discounts over recommendation records.
 *
 * Each operation runs in a single store transaction: either every recomputed
 * row is committed or none is. Input problems surface as `ValidationError`,
 * and so do storage failures (with the storage error as `cause`).
 */
export class DiscountService {
    private readonly logger = createLogger('discount-service');

    constructor(
        private readonly store: RecommendationStore,
        private readonly now: () => Date = () => new Date(),
    ) {}

    /**
     * Discounts every non-null price of every accessory recommendation by
     * `percent`.
     */
    async applyFlatDiscount(percent: unknown): Promise<FlatDiscountResult> {
      const discount = validatePercentage(percent);
      const { MESSAGES, FLAT_DISCOUNT_TYPE } = RECOMMENDATIONS_CONFIG;

      const result = await this.runInTransaction('flat', async repository => {
        const accessories = await repository.findByType(FLAT_DISCOUNT_TYPE);
        if (accessories.length === 0) {
          throw new NotFoundError(MESSAGES.NO_ACCESSORIES);
        }

        const stamp = this.now();
        const discounts: PriceDiscounts = {
          base_product_price: discount,
          recommended_product_price: discount,
        };

        const updated: Recommendation[] = [];
        for (const recommendation of accessories) {
          if (this.discountPrices(recommendation, discounts, stamp)) {
            updated.push(recommendation);
          }
        }

        if (updated.length === 0) {
          throw new NotFoundError(MESSAGES.NO_DISCOUNTABLE_ACCESSORIES);
        }

        await repository.save(updated);
        return { updatedIds: updated.map(recommendation => recommendation.id), count: updated.length };
      });

      this.logger.info({ updatedIds: result.updatedIds, count: result.count }, 'Applied flat accessory discount');
      return result;
    }

    /**
     * Applies per-record, per-field percentages. The whole mapping is checked
     * before any record is read; ids with no record behind them are skipped.
     * Returns the ids whose prices changed, in mapping order.
     */
    async applyCustomDiscounts(mapping: unknown): Promise<number[]> {
      const entries = parseCustomDiscounts(mapping);

      const updatedIds = await this.runInTransaction('custom', async repository => {
        const stamp = this.now();
        const loaded = new Map<number, Recommendation>();
        const updated = new Map<number, Recommendation>();

        for (const { id, discounts } of entries) {
          const recommendation = loaded.get(id) ?? await repository.findById(id);
          if (!recommendation) {
            this.logger.debug({ id }, 'Skipping discount for unknown recommendation');
            continue;
          }
          loaded.set(id, recommendation);

          if (this.discountPrices(recommendation, discounts, stamp)) {
            updated.set(id, recommendation);
          }
        }

        if (updated.size > 0) {
          await repository.save([...updated.values()]);
        }
        return [...updated.keys()];
      });

      this.logger.info({ updatedIds, requested: entries.length }, 'Applied custom discounts');
      return updatedIds;
    }

    // returns true when at least one price was recomputed
    private discountPrices(recommendation: Recommendation, discounts: PriceDiscounts, stamp: Date): boolean {
      let dirty = false;
      for (const field of PRICE_FIELDS) {
        const percent = discounts[field];
        const price = recommendation[field];
        if (percent === undefined || price === null) {
          continue;
        }
        recommendation[field] = applyPercentDiscount(price, percent);
        dirty = true;
      }

      if (dirty) {
        recommendation.updated_date = stamp;
      }
      return dirty;
    }

    private async runInTransaction<T>(
      operation: string,
      work: (repository: RecommendationRepository) => Promise<T>,
    ): Promise<T> {
      try {
        return await this.store.transaction(work);
      } catch (error) {
        if (error instanceof ServiceError) {
          throw error;
        }
        this.logger.error({ err: error, operation }, 'Discount transaction rolled back');
        const reason = error instanceof Error ? error.message : String(error);
        throw new ValidationError(reason, { cause: error });
      }
    }
}
