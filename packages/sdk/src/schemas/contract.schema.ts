import { z } from 'zod';
import type { Address } from 'viem';
import { JsonObjectSchema, openEnum } from './common.js';

export const ACCOUNT_TYPES = ['contract', 'wallet'] as const;

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export interface AddContractRequest {
  network_id: string;
  address: Address;
  display_name?: string;
}

export interface AddWalletRequest {
  address: Address;
  display_name?: string;
  network_ids: string[];
}

export interface VerifiedContractSource {
  contractName: string;
  source: string;
  sourcePath: string;
  networks: Record<string, { address: Address; links?: Record<string, Address> }>;
  compiler: {
    name?: string;
    version: string;
    settings?: Record<string, unknown>;
  };
}

export interface VerifyContractRequest {
  config?: {
    optimizations_used?: boolean;
    optimizations_count?: number;
    evm_version?: string;
  };
  contracts: VerifiedContractSource[];
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export const ContractDetailsSchema = z.object({
  address: z.string().nullish(),
  network_id: z.string().nullish(),
  contract_name: z.string().nullish(),
  compiler_version: z.string().nullish(),
  language: z.string().nullish(),
  verification_type: z.string().nullish(),
  creation_block: z.number().nullish(),
  balance: z.string().nullish(),
});

/** Project account entry. Contracts and wallets share this shape. */
export const ContractSchema = z.object({
  id: z.string(),
  account_type: openEnum(ACCOUNT_TYPES).nullish(),
  display_name: z.string().nullish(),
  network_id: z.string().nullish(),
  address: z.string().nullish(),
  tags: z.array(z.object({ tag: z.string() })).nullish(),
  contract: ContractDetailsSchema.nullish(),
  wallet: JsonObjectSchema.nullish(),
  created_at: z.string().nullish(),
});
export type Contract = z.infer<typeof ContractSchema>;

export const VerifyContractResponseSchema = z.object({
  contracts: z.array(JsonObjectSchema).nullish(),
  bytecode_mismatch_errors: z.array(z.unknown()).nullish(),
});
export type VerifyContractResponse = z.infer<typeof VerifyContractResponseSchema>;
