import { z } from 'zod';

export const DEFAULT_PRICE_RANGE = [0, 999_999] as const;

/**
 * Payload the language model is asked to return for a part request.
 * `part_type` must be present; the vehicle and price range are optional. A
 * price range that is not two finite numbers falls back to the default.
 */
export const PartQueryExtractionSchema = z.object({
  part_type: z.string().trim(),
  vehicle_model: z
    .string()
    .trim()
    .nullish()
    .transform((value) => value ?? ''),
  price_range: z
    .tuple([z.coerce.number().finite(), z.coerce.number().finite()])
    .nullish()
    .transform((value): readonly [number, number] => value ?? DEFAULT_PRICE_RANGE)
    .catch(DEFAULT_PRICE_RANGE),
});

export type PartQueryExtraction = z.output<typeof PartQueryExtractionSchema>;
