import { z } from 'zod';
import { openEnum } from './common.js';

export const CHANNEL_TYPES = ['email', 'slack', 'discord', 'telegram', 'webhook', 'pagerduty'] as const;
export type ChannelType = (typeof CHANNEL_TYPES)[number];

export interface CreateDeliveryChannelRequest {
  type: ChannelType;
  label: string;
  information: Record<string, unknown>;
}

export const DeliveryChannelSchema = z.object({
  id: z.string(),
  type: openEnum(CHANNEL_TYPES),
  label: z.string().nullish(),
  enabled: z.boolean().nullish(),
  owner_id: z.string().nullish(),
  created_at: z.string().nullish(),
});
export type DeliveryChannel = z.infer<typeof DeliveryChannelSchema>;

export const DeliveryChannelListResponseSchema = z.object({
  delivery_channels: z.array(DeliveryChannelSchema).default([]),
});
