import { z } from 'zod';
import type { TenderlyClient } from '../client.js';
import { TenderlyError } from '../error.js';
import { path } from '../internal/path.js';
import { assertAddress } from '../validation.js';
import { ContractSchema, type AddWalletRequest, type Contract } from '../schemas/contract.schema.js';

/** Wallets are project accounts of type "wallet". */
export class WalletsApi {
  private readonly client: TenderlyClient;

  constructor(client: TenderlyClient) {
    this.client = client;
  }

  async list(): Promise<Contract[]> {
    return this.client.send('GET', '/contracts', z.array(ContractSchema), {
      query: { accountType: 'wallet' },
    });
  }

  async get(networkId: string, address: string): Promise<Contract> {
    assertAddress(address, 'address');
    return this.client.send('GET', path`/wallet/${address}/network/${networkId}`, ContractSchema);
  }

  async add(request: AddWalletRequest): Promise<Contract> {
    assertAddress(request.address, 'address');
    if (request.network_ids.length === 0) {
      throw TenderlyError.validation('"network_ids" must contain at least one network');
    }
    return this.client.send('POST', '/wallet', ContractSchema, { body: request });
  }

  async delete(networkId: string, address: string): Promise<void> {
    assertAddress(address, 'address');
    await this.client.sendVoid('DELETE', path`/contract/${networkId}/${address}`);
  }
}
