import { TenderlyError } from '../error.js';
import type {
  ActionRuntime,
  ActionTrigger,
  CreateActionRequest,
} from '../schemas/action.schema.js';

export class ActionRequestBuilder {
  private readonly name: string;
  private readonly functionName: string;
  private readonly source: string;
  private runtime: ActionRuntime = 'v2';
  private description?: string;
  private trigger?: ActionTrigger;

  /**
   * @param functionName - exported function the runtime calls
   * @param source - action source code
   */
  constructor(name: string, functionName: string, source: string) {
    this.name = name;
    this.functionName = functionName;
    this.source = source;
  }

  withRuntime(runtime: ActionRuntime): this {
    this.runtime = runtime;
    return this;
  }

  withDescription(description: string): this {
    this.description = description;
    return this;
  }

  onBlock(networks: Array<string | number>, everyBlocks = 1): this {
    this.trigger = { type: 'block', block: { network: networks.map(String), blocks: everyBlocks } };
    return this;
  }

  onTransaction(filters: Record<string, unknown>[], status: Array<'mined' | 'confirmed'> = ['mined']): this {
    this.trigger = { type: 'transaction', transaction: { status, filters } };
    return this;
  }

  onSchedule(schedule: { interval: string } | { cron: string }): this {
    this.trigger = { type: 'periodic', periodic: { ...schedule } };
    return this;
  }

  onWebhook(authenticated = true): this {
    this.trigger = { type: 'webhook', webhook: { authenticated } };
    return this;
  }

  onAlert(alertId: string): this {
    this.trigger = { type: 'alert', alert: { alert_id: alertId } };
    return this;
  }

  build(): CreateActionRequest {
    if (!this.trigger) {
      throw TenderlyError.validation('Action needs a trigger');
    }
    if (this.functionName.length === 0) {
      throw TenderlyError.validation('"function_name" must not be empty');
    }
    const request: CreateActionRequest = {
      name: this.name,
      runtime: this.runtime,
      function_name: this.functionName,
      source: this.source,
      trigger: this.trigger,
    };
    if (this.description !== undefined) request.description = this.description;
    return request;
  }
}
