/**
 * Simulation API: single and bundle simulations, saved simulations, sharing
 * and transaction traces.
 */

import { z } from 'zod';
import type { TenderlyClient } from '../client.js';
import { path } from '../internal/path.js';
import { DASHBOARD_URL } from '../internal/constants.js';
import {
  BundleSimulationResponseSchema,
  SimulationListResponseSchema,
  SimulationResponseSchema,
  type BundleSimulationRequest,
  type BundleSimulationResponse,
  type SimulationListResponse,
  type SimulationRequest,
  type SimulationResponse,
} from '../schemas/simulation.schema.js';

export class SimulationsApi {
  private readonly client: TenderlyClient;

  constructor(client: TenderlyClient) {
    this.client = client;
  }

  async simulate(request: SimulationRequest): Promise<SimulationResponse> {
    return this.client.send('POST', '/simulate', SimulationResponseSchema, { body: request });
  }

  /** Each transaction runs on top of the state left by the previous ones. */
  async simulateBundle(request: BundleSimulationRequest): Promise<BundleSimulationResponse> {
    return this.client.send('POST', '/simulate-bundle', BundleSimulationResponseSchema, { body: request });
  }

  /**
   * @param page - 0-indexed page number
   * @param perPage - results per page (service maximum 100)
   */
  async list(page = 0, perPage = 20): Promise<SimulationListResponse> {
    return this.client.send('GET', '/simulations', SimulationListResponseSchema, {
      query: { page, perPage },
    });
  }

  async get(id: string): Promise<SimulationResponse> {
    return this.client.send('GET', path`/simulations/${id}`, SimulationResponseSchema);
  }

  /** Raw JSON, passed through undecoded. */
  async info(id: string): Promise<unknown> {
    return this.client.send('GET', path`/simulations/${id}/info`, z.unknown());
  }

  /** Make a simulation public. Resolves to its dashboard URL. */
  async share(id: string): Promise<string> {
    await this.client.sendVoid('POST', path`/simulations/${id}/share`, { body: {} });
    return `${DASHBOARD_URL}${path`/shared/simulation/${id}`}`;
  }

  async unshare(id: string): Promise<void> {
    await this.client.sendVoid('POST', path`/simulations/${id}/unshare`, { body: {} });
  }

  /** Raw JSON, passed through undecoded. */
  async trace(hash: string): Promise<unknown> {
    return this.client.send('GET', path`/trace/${hash}`, z.unknown());
  }
}
