import { z } from 'zod';
import type { Address } from 'viem';
import { JsonObjectSchema, openEnum } from './common.js';

export const ALERT_TYPES = [
  'successful_transaction',
  'failed_transaction',
  'function_call',
  'event_emitted',
  'erc20_transfer',
  'erc721_transfer',
  'state_change',
  'balance_change',
  'transaction_value',
  'whitelisted_caller',
  'blacklisted_caller',
  'view_function',
  'method_call',
] as const;
export type AlertType = (typeof ALERT_TYPES)[number];

export const ALERT_TARGETS = ['address', 'network', 'project', 'tag'] as const;
export type AlertTarget = (typeof ALERT_TARGETS)[number];

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export interface AlertExpression {
  type: string;
  expression: Record<string, unknown>;
}

export interface AlertDeliveryChannel {
  id: string;
  enabled: boolean;
}

export interface CreateAlertRequest {
  name: string;
  description?: string;
  type: AlertType;
  target: AlertTarget;
  network_id: string;
  address?: Address;
  tag?: string;
  enabled: boolean;
  expressions: AlertExpression[];
  delivery_channels: AlertDeliveryChannel[];
}

export type UpdateAlertRequest = Partial<CreateAlertRequest>;

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export const AlertSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  type: openEnum(ALERT_TYPES).nullish(),
  target: openEnum(ALERT_TARGETS).nullish(),
  network_id: z.string().nullish(),
  address: z.string().nullish(),
  tag: z.string().nullish(),
  enabled: z.boolean().nullish(),
  expressions: z.array(z.object({
    type: z.string(),
    expression: JsonObjectSchema.nullish(),
  })).nullish(),
  delivery_channels: z.array(z.object({
    id: z.string(),
    enabled: z.boolean().nullish(),
  })).nullish(),
  created_at: z.string().nullish(),
});
export type Alert = z.infer<typeof AlertSchema>;

export const AlertListResponseSchema = z.object({
  alerts: z.array(AlertSchema).default([]),
});

export const AlertHistoryEntrySchema = z.object({
  id: z.string(),
  alert_id: z.string().nullish(),
  network_id: z.string().nullish(),
  tx_hash: z.string().nullish(),
  created_at: z.string().nullish(),
});
export type AlertHistoryEntry = z.infer<typeof AlertHistoryEntrySchema>;

export const AlertHistoryResponseSchema = z.object({
  alert_history: z.array(AlertHistoryEntrySchema).default([]),
});
