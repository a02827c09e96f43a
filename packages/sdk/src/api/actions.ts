/**
 * Web3 Actions API.
 *
 * stopMany()/resumeMany() send every id in one request; their verb, path and
 * body key come from BULK_ENDPOINTS.
 */

import type { TenderlyClient } from '../client.js';
import { BULK_ENDPOINTS } from '../internal/endpoints.js';
import { path } from '../internal/path.js';
import {
  ActionListResponseSchema,
  ActionSchema,
  ExecutionListResponseSchema,
  InvokeActionResponseSchema,
  type Action,
  type CreateActionRequest,
  type Execution,
  type InvokeActionResponse,
  type ListExecutionsParams,
  type UpdateActionRequest,
} from '../schemas/action.schema.js';

export class ActionsApi {
  private readonly client: TenderlyClient;

  constructor(client: TenderlyClient) {
    this.client = client;
  }

  async list(): Promise<Action[]> {
    const res = await this.client.send('GET', '/actions', ActionListResponseSchema);
    return res.actions;
  }

  async get(id: string): Promise<Action> {
    return this.client.send('GET', path`/actions/${id}`, ActionSchema);
  }

  async create(request: CreateActionRequest): Promise<Action> {
    return this.client.send('POST', '/actions', ActionSchema, { body: request });
  }

  async update(id: string, request: UpdateActionRequest): Promise<Action> {
    return this.client.send('PATCH', path`/actions/${id}`, ActionSchema, { body: request });
  }

  async delete(id: string): Promise<void> {
    await this.client.sendVoid('DELETE', path`/actions/${id}`);
  }

  async stop(id: string): Promise<void> {
    await this.client.sendVoid('POST', path`/actions/${id}/stop`, { body: {} });
  }

  async resume(id: string): Promise<void> {
    await this.client.sendVoid('POST', path`/actions/${id}/resume`, { body: {} });
  }

  async stopMany(ids: readonly string[]): Promise<void> {
    await this.client.sendBulk(BULK_ENDPOINTS.stopActions, ids);
  }

  async resumeMany(ids: readonly string[]): Promise<void> {
    await this.client.sendBulk(BULK_ENDPOINTS.resumeActions, ids);
  }

  /** Run a webhook-triggered action manually with `payload`. */
  async invoke(id: string, payload: unknown): Promise<InvokeActionResponse> {
    return this.client.send('POST', path`/actions/${id}/invoke`, InvokeActionResponseSchema, {
      body: { payload },
    });
  }

  async executions(id: string, params?: ListExecutionsParams): Promise<Execution[]> {
    const res = await this.client.send('GET', path`/actions/${id}/executions`, ExecutionListResponseSchema, {
      query: { page: params?.page, per_page: params?.perPage },
    });
    return res.executions;
  }
}
