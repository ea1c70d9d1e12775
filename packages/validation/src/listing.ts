import { z } from 'zod';

export const CachedListingRecordSchema = z.object({
  name: z.string(),
  price: z.number().finite().nonnegative(),
  rating: z.number().finite(),
  link: z.string(),
});

export const CachedListingRecordsSchema = z.array(CachedListingRecordSchema);

export type CachedListingRecordInput = z.infer<typeof CachedListingRecordSchema>;
