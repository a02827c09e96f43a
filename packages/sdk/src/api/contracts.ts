import { z } from 'zod';
import type { TenderlyClient } from '../client.js';
import { path } from '../internal/path.js';
import { assertAddress } from '../validation.js';
import {
  ContractSchema,
  VerifyContractResponseSchema,
  type AddContractRequest,
  type Contract,
  type VerifyContractRequest,
  type VerifyContractResponse,
} from '../schemas/contract.schema.js';

export class ContractsApi {
  private readonly client: TenderlyClient;

  constructor(client: TenderlyClient) {
    this.client = client;
  }

  async list(): Promise<Contract[]> {
    return this.client.send('GET', '/contracts', z.array(ContractSchema), {
      query: { accountType: 'contract' },
    });
  }

  async get(networkId: string, address: string): Promise<Contract> {
    assertAddress(address, 'address');
    return this.client.send('GET', path`/contract/${networkId}/${address}`, ContractSchema);
  }

  async add(request: AddContractRequest): Promise<Contract> {
    assertAddress(request.address, 'address');
    return this.client.send('POST', '/address', ContractSchema, { body: request });
  }

  async rename(networkId: string, address: string, displayName: string): Promise<void> {
    assertAddress(address, 'address');
    await this.client.sendVoid('POST', path`/contract/${networkId}/${address}/rename`, {
      body: { display_name: displayName },
    });
  }

  async tag(networkId: string, address: string, tag: string): Promise<void> {
    assertAddress(address, 'address');
    await this.client.sendVoid('POST', path`/contract/${networkId}/${address}/tag`, { body: { tag } });
  }

  async delete(networkId: string, address: string): Promise<void> {
    assertAddress(address, 'address');
    await this.client.sendVoid('DELETE', path`/contract/${networkId}/${address}`);
  }

  /** Submit sources for verification on the networks each contract lists. */
  async verify(request: VerifyContractRequest): Promise<VerifyContractResponse> {
    for (const contract of request.contracts) {
      for (const deployment of Object.values(contract.networks)) {
        assertAddress(deployment.address, `${contract.contractName}.address`);
      }
    }
    return this.client.send('POST', '/contracts/verify', VerifyContractResponseSchema, { body: request });
  }
}
