import type { TenderlyClient } from '../client.js';
import { path } from '../internal/path.js';
import {
  DeliveryChannelListResponseSchema,
  DeliveryChannelSchema,
  type CreateDeliveryChannelRequest,
  type DeliveryChannel,
} from '../schemas/delivery-channel.schema.js';

/** Destinations (email, Slack, webhook, ...) that alert notifications go to. */
export class DeliveryChannelsApi {
  private readonly client: TenderlyClient;

  constructor(client: TenderlyClient) {
    this.client = client;
  }

  async listProject(): Promise<DeliveryChannel[]> {
    const res = await this.client.send('GET', '/delivery-channels', DeliveryChannelListResponseSchema);
    return res.delivery_channels;
  }

  async listAccount(): Promise<DeliveryChannel[]> {
    const res = await this.client.send('GET', '/delivery-channels', DeliveryChannelListResponseSchema, {
      scope: 'account',
    });
    return res.delivery_channels;
  }

  async create(request: CreateDeliveryChannelRequest): Promise<DeliveryChannel> {
    return this.client.send('POST', '/delivery-channels', DeliveryChannelSchema, { body: request });
  }

  async delete(id: string): Promise<void> {
    await this.client.sendVoid('DELETE', path`/delivery-channels/${id}`);
  }
}
