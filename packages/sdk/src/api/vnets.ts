/**
 * Virtual TestNets API: lifecycle, transactions and the per-VNet admin RPC.
 */

import { z } from 'zod';
import type { TenderlyClient } from '../client.js';
import { TenderlyError } from '../error.js';
import { BULK_ENDPOINTS } from '../internal/endpoints.js';
import { path } from '../internal/path.js';
import { assertHex } from '../validation.js';
import { AdminRpc } from './admin-rpc.js';
import {
  VNetSchema,
  VNetSimulationResultSchema,
  VNetTransactionListSchema,
  VNetTransactionSchema,
  type CreateVNetRequest,
  type ForkVNetRequest,
  type ListVNetTransactionsParams,
  type ListVNetsParams,
  type UpdateVNetRequest,
  type VNet,
  type VNetSimulateTransactionRequest,
  type VNetSimulationResult,
  type VNetTransaction,
  type VNetTransactionRequest,
} from '../schemas/vnet.schema.js';

export interface VNetRpcUrls {
  admin?: string;
  public?: string;
}

/** Pick the admin and public RPC URLs out of a VNet's endpoint list by name. */
export function rpcUrls(vnet: Pick<VNet, 'rpcs'>): VNetRpcUrls {
  const endpoints = vnet.rpcs ?? [];
  const find = (needle: string) =>
    endpoints.find((e) => e.name.toLowerCase().includes(needle))?.url;
  return { admin: find('admin'), public: find('public') };
}

export class VNetsApi {
  private readonly client: TenderlyClient;

  constructor(client: TenderlyClient) {
    this.client = client;
  }

  async create(request: CreateVNetRequest): Promise<VNet> {
    return this.client.send('POST', '/vnets', VNetSchema, { body: request });
  }

  /** The service answers with a bare array. */
  async list(params?: ListVNetsParams): Promise<VNet[]> {
    return this.client.send('GET', '/vnets', z.array(VNetSchema), {
      query: { slug: params?.slug, page: params?.page, per_page: params?.perPage },
    });
  }

  async get(id: string): Promise<VNet> {
    return this.client.send('GET', path`/vnets/${id}`, VNetSchema);
  }

  async update(id: string, request: UpdateVNetRequest): Promise<VNet> {
    return this.client.send('PATCH', path`/vnets/${id}`, VNetSchema, { body: request });
  }

  async delete(id: string): Promise<void> {
    await this.client.sendVoid('DELETE', path`/vnets/${id}`);
  }

  /** Delete several VNets in a single request. */
  async deleteMany(ids: readonly string[]): Promise<void> {
    await this.client.sendBulk(BULK_ENDPOINTS.deleteVNets, ids);
  }

  async fork(request: ForkVNetRequest): Promise<VNet> {
    return this.client.send('POST', '/vnets/fork', VNetSchema, { body: request });
  }

  // --- Transactions ---
  async listTransactions(id: string, params?: ListVNetTransactionsParams): Promise<VNetTransaction[]> {
    return this.client.send('GET', path`/vnets/${id}/transactions`, VNetTransactionListSchema, {
      query: {
        address: params?.address,
        status: params?.status,
        page: params?.page,
        per_page: params?.perPage,
      },
    });
  }

  async getTransaction(id: string, hash: string): Promise<VNetTransaction> {
    return this.client.send('GET', path`/vnets/${id}/transactions/${hash}`, VNetTransactionSchema);
  }

  async simulateTransaction(id: string, request: VNetSimulateTransactionRequest): Promise<VNetSimulationResult> {
    assertHex(request.input, 'input');
    return this.client.send('POST', path`/vnets/${id}/transactions/simulate`, VNetSimulationResultSchema, {
      body: request,
    });
  }

  async sendTransaction(id: string, request: VNetTransactionRequest): Promise<VNetTransaction> {
    return this.client.send('POST', path`/vnets/${id}/transactions`, VNetTransactionSchema, { body: request });
  }

  // --- Admin RPC ---
  /**
   * Admin RPC client for a VNet, or for an admin RPC URL given directly.
   * @throws TenderlyError (VALIDATION) if the VNet lists no admin endpoint
   */
  admin(vnet: Pick<VNet, 'rpcs'> | string): AdminRpc {
    const url = typeof vnet === 'string' ? vnet : rpcUrls(vnet).admin;
    if (!url) {
      throw TenderlyError.validation('VNet has no admin RPC endpoint', 'NO_ADMIN_RPC');
    }
    return new AdminRpc(this.client, url);
  }
}
