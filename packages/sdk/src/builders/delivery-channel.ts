import type { CreateDeliveryChannelRequest } from '../schemas/delivery-channel.schema.js';

export function webhookChannel(label: string, url: string): CreateDeliveryChannelRequest {
  return { type: 'webhook', label, information: { webhook_url: url } };
}

export function emailChannel(label: string, email: string): CreateDeliveryChannelRequest {
  return { type: 'email', label, information: { email } };
}

export function slackChannel(label: string, webhookUrl: string): CreateDeliveryChannelRequest {
  return { type: 'slack', label, information: { webhook_url: webhookUrl } };
}
