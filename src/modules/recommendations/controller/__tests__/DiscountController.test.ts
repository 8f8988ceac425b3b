import { describe, test, expect, beforeEach } from '@jest/globals';

import { jsonRequest, mockRequest, mockResponse, sentBody } from '../../../../http/__tests__/mocks';
import { InMemoryRecommendationStore } from '../../__tests__/support/InMemoryRecommendationStore';
import { buildRecommendation } from '../../__tests__/support/factories';
import { DiscountService } from '../../service/DiscountService';
import { DiscountController } from '../DiscountController';

describe('DiscountController', () => {
  let store: InMemoryRecommendationStore;
  let controller: DiscountController;

  beforeEach(async () => {
    store = new InMemoryRecommendationStore();
    controller = new DiscountController(new DiscountService(store));
    await store.seed(
      buildRecommendation({ recommendation_type: 'accessory', base_product_price: '100.00', recommended_product_price: '50.00' }),
      buildRecommendation({ recommendation_type: 'accessory', base_product_price: '20.00', recommended_product_price: '10.00' }),
      buildRecommendation({ recommendation_type: 'cross-sell', base_product_price: '200.00', recommended_product_price: '20.00' }),
    );
  });

  describe('flat discount', () => {
    test('applies the query percentage to accessories', async () => {
      const res = mockResponse();
      await controller.applyDiscount(mockRequest({ query: { discount: '10' } }), res);

      expect(res.status).toHaveBeenCalledWith(200);
      expect(sentBody(res)).toEqual({
        message: 'Applied 10% discount to 2 accessory recommendations',
        updated_count: 2,
        updated_ids: [1, 2],
      });
      expect(store.snapshot(1)?.base_product_price).toBe('90.00');
    });

    test('echoes the trimmed percentage in the message', async () => {
      const res = mockResponse();
      await controller.applyDiscount(mockRequest({ query: { discount: ' 12.5 ' } }), res);

      expect(sentBody(res)).toHaveProperty('message', 'Applied 12.5% discount to 2 accessory recommendations');
    });

    test('uses the first value of a repeated discount parameter', async () => {
      const res = mockResponse();
      await controller.applyDiscount(mockRequest({ query: { discount: ['10', '20'] } }), res);

      expect(res.status).toHaveBeenCalledWith(200);
      expect(sentBody(res)).toHaveProperty('message', 'Applied 10% discount to 2 accessory recommendations');
      expect(store.snapshot(1)?.base_product_price).toBe('90.00');
    });

    test('takes precedence over a JSON body', async () => {
      const res = mockResponse();
      await controller.applyDiscount(
        jsonRequest({ '3': { base_product_price: 50 } }, { query: { discount: '50' } }),
        res,
      );

      expect(sentBody(res)).toHaveProperty('updated_ids', [1, 2]);
      expect(store.snapshot(3)?.base_product_price).toBe('200.00');
    });

    test.each(['0', '100', '-5', 'abc', ''])('answers 400 for discount=%p', async discount => {
      const res = mockResponse();
      await controller.applyDiscount(mockRequest({ query: { discount } }), res);

      expect(res.status).toHaveBeenCalledWith(400);
      expect(sentBody(res)).toEqual({ message: 'Discount must be between 0 and 100' });
    });

    test('answers 404 when there are no accessories', async () => {
      await store.transaction(async repository => {
        await repository.remove(1);
        await repository.remove(2);
      });
      const res = mockResponse();
      await controller.applyDiscount(mockRequest({ query: { discount: '10' } }), res);

      expect(res.status).toHaveBeenCalledWith(404);
      expect(sentBody(res)).toEqual({ message: 'No matching accessory recommendations found' });
    });

    test('answers 400 with the storage error when the commit fails', async () => {
      store.failNextCommit = new Error('could not serialize access');
      const res = mockResponse();
      await controller.applyDiscount(mockRequest({ query: { discount: '10' } }), res);

      expect(res.status).toHaveBeenCalledWith(400);
      expect(sentBody(res)).toEqual({ message: 'could not serialize access' });
    });
  });

  describe('custom discounts', () => {
    test('applies the mapping and reports the updated ids', async () => {
      const res = mockResponse();
      await controller.applyDiscount(jsonRequest({
        '3': { base_product_price: 10, recommended_product_price: 20 },
        '999': { base_product_price: 10 },
      }), res);

      expect(res.status).toHaveBeenCalledWith(200);
      expect(sentBody(res)).toEqual({ message: 'Applied custom discounts to 1 recommendations', updated_ids: [3] });
      expect(store.snapshot(3)?.recommended_product_price).toBe('16.00');
    });

    test('answers 200 with no ids when nothing matched', async () => {
      const res = mockResponse();
      await controller.applyDiscount(jsonRequest({ '999': { base_product_price: 10 } }), res);

      expect(res.status).toHaveBeenCalledWith(200);
      expect(sentBody(res)).toEqual({ message: 'Applied custom discounts to 0 recommendations', updated_ids: [] });
    });

    test('answers 400 for a malformed mapping', async () => {
      const res = mockResponse();
      await controller.applyDiscount(jsonRequest({ '1': { base_product_price: 10 }, 'invalid': { base_product_price: 30 } }), res);

      expect(res.status).toHaveBeenCalledWith(400);
      expect(sentBody(res)).toEqual({ message: 'Keys must be numeric recommendation IDs' });
      expect(store.snapshot(1)?.base_product_price).toBe('100.00');
    });

    test('answers 400 when neither a query nor a JSON body is given', async () => {
      const res = mockResponse();
      await controller.applyDiscount(mockRequest({ body: 'discount=10' }), res);

      expect(res.status).toHaveBeenCalledWith(400);
      expect(sentBody(res)).toEqual({ message: 'A discount query parameter or a JSON body is required' });
    });
  });
});
