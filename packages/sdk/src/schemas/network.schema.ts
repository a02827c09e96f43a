import { z } from 'zod';
import { JsonObjectSchema } from './common.js';

export const NetworkSchema = z.object({
  id: z.string(),
  ethereum_network_id: z.number().nullish(),
  name: z.string(),
  slug: z.string().nullish(),
  chain_config: JsonObjectSchema.nullish(),
  metadata: z.object({
    color: z.string().nullish(),
    icon: z.string().nullish(),
    explorer_url: z.string().nullish(),
    currency_symbol: z.string().nullish(),
  }).nullish(),
  sort_order: z.number().nullish(),
});
export type Network = z.infer<typeof NetworkSchema>;
