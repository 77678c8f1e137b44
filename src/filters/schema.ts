import { z } from 'zod';

export const FilterSetSchema = z.object({
  price_min: z.number().nonnegative().optional(),
  price_max: z.number().nonnegative().optional(),
  bedrooms_min: z.number().int().nonnegative().optional(),
  property_types: z.array(z.string()).optional(),
  cities: z.array(z.string()).optional(),
  include_sold: z.boolean().optional(),
});
