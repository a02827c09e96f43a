import { z } from 'zod';
import type { Address, Hex } from 'viem';
import { JsonObjectSchema } from './common.js';

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export interface SyncStateConfig {
  enabled: boolean;
}

export interface ExplorerPageConfig {
  enabled: boolean;
  verification_visibility: string;
}

export interface CreateVNetRequest {
  slug: string;
  display_name: string;
  fork_config: {
    network_id: number;
    block_number?: number;
  };
  virtual_network_config: {
    chain_config: { chain_id: number };
    base_fee_per_gas?: number;
  };
  sync_state_config?: SyncStateConfig;
  explorer_page_config?: ExplorerPageConfig;
}

export interface UpdateVNetRequest {
  slug?: string;
  display_name?: string;
  sync_state_config?: SyncStateConfig;
  explorer_page_config?: ExplorerPageConfig;
}

export interface ForkVNetRequest {
  srcTestnetId: string;
  slug: string;
  display_name: string;
  block_number?: number;
}

export interface VNetAccessListItem {
  address: Address;
  storage_keys: Hex[];
}

/** Body for both sending and simulating a transaction on a VNet. */
export interface VNetTransactionRequest {
  from: Address;
  to: Address;
  input?: Hex;
  value?: Hex;
  gas?: number;
  gas_price?: Hex;
  max_fee_per_gas?: Hex;
  max_priority_fee_per_gas?: Hex;
  nonce?: number;
  type?: 0 | 1 | 2;
  access_list?: VNetAccessListItem[];
}

/** Simulation on a VNet always carries calldata, even if empty ("0x"). */
export type VNetSimulateTransactionRequest = VNetTransactionRequest & { input: Hex };

export interface ListVNetsParams {
  slug?: string;
  page?: number;
  perPage?: number;
}

export interface ListVNetTransactionsParams {
  address?: string;
  status?: boolean;
  page?: number;
  perPage?: number;
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export const RpcEndpointSchema = z.object({
  name: z.string(),
  url: z.string(),
});
export type RpcEndpoint = z.infer<typeof RpcEndpointSchema>;

export const VNetSchema = z.object({
  id: z.string(),
  slug: z.string(),
  display_name: z.string(),
  fork_config: z.object({
    network_id: z.number(),
    // hex string such as "0x170abab"
    block_number: z.union([z.string(), z.number()]).nullish(),
  }),
  virtual_network_config: z.object({
    chain_config: z.object({ chain_id: z.number() }).nullish(),
    base_fee_per_gas: z.number().nullish(),
    accounts: z.array(z.unknown()).nullish(),
  }),
  sync_state_config: z.object({ enabled: z.boolean() }).nullish(),
  explorer_page_config: z.object({
    enabled: z.boolean(),
    verification_visibility: z.string().nullish(),
  }).nullish(),
  rpcs: z.array(RpcEndpointSchema).nullish(),
  status: z.string().nullish(),
  created_at: z.string().nullish(),
});
export type VNet = z.infer<typeof VNetSchema>;

export const VNetTransactionSchema = z.object({
  id: z.string().nullish(),
  hash: z.string().nullish(),
  tx_hash: z.string().nullish(),
  kind: z.string().nullish(),
  block_number: z.union([z.number(), z.string()]).nullish(),
  from: z.string().nullish(),
  to: z.string().nullish(),
  value: z.string().nullish(),
  input: z.string().nullish(),
  gas_used: z.union([z.number(), z.string()]).nullish(),
  status: z.union([z.boolean(), z.string()]).nullish(),
  timestamp: z.string().nullish(),
  created_at: z.string().nullish(),
});
export type VNetTransaction = z.infer<typeof VNetTransactionSchema>;

export const VNetTransactionListSchema = z.union([
  z.array(VNetTransactionSchema),
  z.object({ transactions: z.array(VNetTransactionSchema).default([]) })
    .transform((r) => r.transactions),
]);

export const VNetSimulationResultSchema = z.object({
  status: z.boolean().nullish(),
  gas_used: z.union([z.number(), z.string()]).nullish(),
  block_number: z.union([z.number(), z.string()]).nullish(),
  logs: z.array(z.unknown()).nullish(),
  trace: z.array(z.unknown()).nullish(),
  asset_changes: z.array(JsonObjectSchema).nullish(),
  balance_changes: z.array(JsonObjectSchema).nullish(),
  error_message: z.string().nullish(),
});
export type VNetSimulationResult = z.infer<typeof VNetSimulationResultSchema>;
