import { assertAddress } from '../validation.js';
import { TenderlyError } from '../error.js';
import type {
  AlertExpression,
  AlertTarget,
  AlertType,
  CreateAlertRequest,
} from '../schemas/alert.schema.js';

export class AlertRequestBuilder {
  private readonly name: string;
  private readonly type: AlertType;
  private readonly networkId: string;
  private target: AlertTarget = 'project';
  private address?: string;
  private tag?: string;
  private description?: string;
  private enabled = true;
  private readonly expressions: AlertExpression[] = [];
  private readonly channels: string[] = [];

  constructor(name: string, type: AlertType, networkId: string | number) {
    this.name = name;
    this.type = type;
    this.networkId = String(networkId);
  }

  /** Watch a single address. */
  forAddress(address: string): this {
    this.target = 'address';
    this.address = address;
    return this;
  }

  /** Watch every contract carrying `tag`. */
  forTag(tag: string): this {
    this.target = 'tag';
    this.tag = tag;
    return this;
  }

  forNetwork(): this {
    this.target = 'network';
    return this;
  }

  forProject(): this {
    this.target = 'project';
    return this;
  }

  withDescription(description: string): this {
    this.description = description;
    return this;
  }

  expression(type: string, expression: Record<string, unknown>): this {
    this.expressions.push({ type, expression });
    return this;
  }

  deliveryChannel(channelId: string): this {
    this.channels.push(channelId);
    return this;
  }

  disabled(): this {
    this.enabled = false;
    return this;
  }

  build(): CreateAlertRequest {
    if (this.name.length === 0) {
      throw TenderlyError.validation('"name" must not be empty');
    }
    const request: CreateAlertRequest = {
      name: this.name,
      type: this.type,
      target: this.target,
      network_id: this.networkId,
      enabled: this.enabled,
      expressions: [...this.expressions],
      delivery_channels: this.channels.map((id) => ({ id, enabled: true })),
    };
    if (this.description !== undefined) request.description = this.description;
    if (this.target === 'address') {
      request.address = assertAddress(this.address, 'address');
    }
    if (this.target === 'tag') {
      if (!this.tag) throw TenderlyError.validation('"tag" must not be empty');
      request.tag = this.tag;
    }
    return request;
  }
}
