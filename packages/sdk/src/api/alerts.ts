import type { TenderlyClient } from '../client.js';
import { path } from '../internal/path.js';
import type { PageParams } from '../schemas/common.js';
import {
  AlertHistoryResponseSchema,
  AlertListResponseSchema,
  AlertSchema,
  type Alert,
  type AlertHistoryEntry,
  type CreateAlertRequest,
  type UpdateAlertRequest,
} from '../schemas/alert.schema.js';

export class AlertsApi {
  private readonly client: TenderlyClient;

  constructor(client: TenderlyClient) {
    this.client = client;
  }

  async list(): Promise<Alert[]> {
    const res = await this.client.send('GET', '/alerts', AlertListResponseSchema);
    return res.alerts;
  }

  async get(id: string): Promise<Alert> {
    return this.client.send('GET', path`/alerts/${id}`, AlertSchema);
  }

  async create(request: CreateAlertRequest): Promise<Alert> {
    return this.client.send('POST', '/alerts', AlertSchema, { body: request });
  }

  async update(id: string, request: UpdateAlertRequest): Promise<Alert> {
    return this.client.send('PUT', path`/alerts/${id}`, AlertSchema, { body: request });
  }

  async delete(id: string): Promise<void> {
    await this.client.sendVoid('DELETE', path`/alerts/${id}`);
  }

  async enable(id: string): Promise<void> {
    await this.client.sendVoid('PATCH', path`/alerts/${id}`, { body: { enabled: true } });
  }

  async disable(id: string): Promise<void> {
    await this.client.sendVoid('PATCH', path`/alerts/${id}`, { body: { enabled: false } });
  }

  /** Alerts that fired, newest first. */
  async history(params?: PageParams): Promise<AlertHistoryEntry[]> {
    const res = await this.client.send('GET', '/alert-history', AlertHistoryResponseSchema, {
      query: { page: params?.page, per_page: params?.perPage },
    });
    return res.alert_history;
  }
}
