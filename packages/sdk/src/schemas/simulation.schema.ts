import { z } from 'zod';
import type { Address, Hex } from 'viem';
import { JsonObjectSchema } from './common.js';

export const SIMULATION_TYPES = ['full', 'quick', 'abi'] as const;
export type SimulationType = (typeof SIMULATION_TYPES)[number];

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export interface StateOverride {
  balance?: Hex;
  code?: Hex;
  storage?: Record<Hex, Hex>;
}

export interface AccessListItem {
  address: Address;
  storage_keys: Hex[];
}

export interface SimulationRequest {
  network_id: string;
  from: Address;
  to: Address;
  input: Hex;
  value?: Hex;
  gas?: number;
  gas_price?: Hex;
  block_number?: number;
  transaction_index?: number;
  save: boolean;
  save_if_fails?: boolean;
  simulation_type: SimulationType;
  estimate_gas?: boolean;
  generate_access_list?: boolean;
  access_list?: AccessListItem[];
  state_objects?: Record<Address, StateOverride>;
}

export interface BundleSimulationRequest {
  simulations: SimulationRequest[];
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

const NumberOrString = z.union([z.number(), z.string()]);

export const AccessListItemSchema = z.object({
  address: z.string(),
  storage_keys: z.array(z.string()).default([]),
});

export const SimulationTransactionSchema = z.object({
  hash: z.string().nullish(),
  block_number: z.number().nullish(),
  from: z.string().nullish(),
  to: z.string().nullish(),
  input: z.string().nullish(),
  value: z.string().nullish(),
  nonce: z.number().nullish(),
  gas: z.number().nullish(),
  gas_price: NumberOrString.nullish(),
  gas_used: z.number().nullish(),
  status: z.boolean().nullish(),
  network_id: z.string().nullish(),
  error_message: z.string().nullish(),
  method: z.string().nullish(),
  transaction_info: JsonObjectSchema.nullish(),
});
export type SimulationTransaction = z.infer<typeof SimulationTransactionSchema>;

export const SimulationSchema = z.object({
  id: z.string(),
  project_id: z.string().nullish(),
  owner_id: z.string().nullish(),
  network_id: z.string().nullish(),
  block_number: z.number().nullish(),
  transaction_index: z.number().nullish(),
  from: z.string().nullish(),
  to: z.string().nullish(),
  input: z.string().nullish(),
  gas: z.number().nullish(),
  gas_price: NumberOrString.nullish(),
  gas_used: z.number().nullish(),
  value: z.string().nullish(),
  method: z.string().nullish(),
  status: z.boolean().nullish(),
  shared: z.boolean().nullish(),
  created_at: z.string().nullish(),
});
export type Simulation = z.infer<typeof SimulationSchema>;

export const SimulationResponseSchema = z.object({
  simulation: SimulationSchema,
  transaction: SimulationTransactionSchema.nullish(),
  contracts: z.array(JsonObjectSchema).nullish(),
  generated_access_list: z.array(AccessListItemSchema).nullish(),
});
export type SimulationResponse = z.infer<typeof SimulationResponseSchema>;

export const BundleSimulationResponseSchema = z.object({
  simulation_results: z.array(SimulationResponseSchema),
});
export type BundleSimulationResponse = z.infer<typeof BundleSimulationResponseSchema>;

export const SimulationListResponseSchema = z.object({
  simulations: z.array(SimulationSchema).default([]),
});
export type SimulationListResponse = z.infer<typeof SimulationListResponseSchema>;
