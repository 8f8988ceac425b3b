import { ValidationError } from '../../../errors';
import { HttpRequest, HttpResponse, sendError } from '../../../http/respond';
import { createLogger } from '../../../logger';
import { RECOMMENDATIONS_CONFIG } from '../config';
import { CustomDiscountResponse, FlatDiscountResponse } from '../dto/discount.dto';
import { DiscountService } from '../service/DiscountService';

export class DiscountController {
    private readonly logger = createLogger('discount-controller');

    constructor(private readonly discountService: DiscountService) {}

    /**
     * `?discount=<percent>` selects the flat accessory discount, whatever the
     * body holds; when repeated, the first value counts. Without it a JSON
     * body is read as a custom id → discount mapping.
     */
    async applyDiscount(req: HttpRequest, res: HttpResponse): Promise<void> {
      try {
        const { discount: raw } = req.query;
        const discount = Array.isArray(raw) ? raw[0] : raw;

        if (discount !== undefined) {
          const result = await this.discountService.applyFlatDiscount(discount);
          const body: FlatDiscountResponse = {
            message: `Applied ${String(discount).trim()}% discount to ${result.count} accessory recommendations`,
            updated_count: result.count,
            updated_ids: result.updatedIds,
          };
          res.status(200).json(body);
          return;
        }

        if (req.is('application/json')) {
          const updatedIds = await this.discountService.applyCustomDiscounts(req.body);
          const body: CustomDiscountResponse = {
            message: `Applied custom discounts to ${updatedIds.length} recommendations`,
            updated_ids: updatedIds,
          };
          res.status(200).json(body);
          return;
        }

        throw new ValidationError(RECOMMENDATIONS_CONFIG.MESSAGES.DISCOUNT_INPUT_REQUIRED);
      } catch (error) {
        sendError(res, error, this.logger);
      }
    }
}
