import { describe, expect, it } from 'vitest';

import { PartQueryExtractionSchema } from '../part-query.js';

describe('PartQueryExtractionSchema', () => {
  it('accepts a complete extraction', () => {
    const result = PartQueryExtractionSchema.safeParse({
      part_type: ' brake pad ',
      vehicle_model: 'Honda City',
      price_range: [500, 2500],
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({
        part_type: 'brake pad',
        vehicle_model: 'Honda City',
        price_range: [500, 2500],
      });
    }
  });

  it('fills a missing vehicle and price range', () => {
    const result = PartQueryExtractionSchema.safeParse({
      part_type: 'wiper blade',
      vehicle_model: null,
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.vehicle_model).toBe('');
      expect(result.data.price_range).toEqual([0, 999_999]);
    }
  });

  it('coerces numeric strings in the price range', () => {
    const result = PartQueryExtractionSchema.safeParse({
      part_type: 'clutch plate',
      vehicle_model: 'Swift',
      price_range: ['1000', '3000'],
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.price_range).toEqual([1000, 3000]);
    }
  });

  it('rejects a payload without part_type', () => {
    expect(PartQueryExtractionSchema.safeParse({ vehicle_model: 'Swift' }).success).toBe(false);
  });

  it.each([[[100]], [[]], ['not specified'], [[1000, 2000, 'INR']], [['under 2000', null]]])(
    'defaults a malformed price range %j',
    (priceRange) => {
      const result = PartQueryExtractionSchema.safeParse({
        part_type: 'air filter',
        vehicle_model: 'Creta',
        price_range: priceRange,
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({
          part_type: 'air filter',
          vehicle_model: 'Creta',
          price_range: [0, 999_999],
        });
      }
    }
  );
});
