import { z } from 'zod';
import type { TenderlyClient } from '../client.js';
import { NetworkSchema, type Network } from '../schemas/network.schema.js';

export class NetworksApi {
  private readonly client: TenderlyClient;

  constructor(client: TenderlyClient) {
    this.client = client;
  }

  /** Networks supported by the platform. Not scoped to the project. */
  async list(): Promise<Network[]> {
    return this.client.send('GET', '/public-networks', z.array(NetworkSchema), { scope: 'api' });
  }

  /** Match on the network id or the chain id; undefined when unsupported. */
  async get(networkId: string | number): Promise<Network | undefined> {
    const id = String(networkId);
    const networks = await this.list();
    return networks.find((n) => n.id === id || String(n.ethereum_network_id) === id);
  }
}
