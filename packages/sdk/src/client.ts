/**
 * TenderlyClient - core client for the Tenderly REST API.
 *
 * Owns the configuration and the HTTP transport, and hands out one typed
 * sub-client per API family:
 * - simulations(), vnets() (with admin RPC), contracts(), wallets()
 * - networks(), alerts(), actions(), deliveryChannels()
 *
 * Every sub-client method goes through send()/sendVoid(), which build the
 * URL, attach the access key and decode the response. Construction is local:
 * no request is made until a method is called.
 */

import type { z } from 'zod';
import { HttpClient, type Logger } from './internal/http.js';
import type { BulkEndpoint } from './internal/endpoints.js';
import { queryString, type QueryValue } from './internal/path.js';
import { assertNonEmpty } from './validation.js';
import { TenderlyError } from './error.js';
import { configFromEnv, createConfig, type ConfigOptions, type TenderlyConfig } from './config.js';
import { JsonRpcResponseSchema, type JsonRpcRequest, type JsonRpcResponse } from './schemas/rpc.schema.js';
import { SimulationsApi } from './api/simulations.js';
import { VNetsApi } from './api/vnets.js';
import { ContractsApi } from './api/contracts.js';
import { WalletsApi } from './api/wallets.js';
import { NetworksApi } from './api/networks.js';
import { AlertsApi } from './api/alerts.js';
import { ActionsApi } from './api/actions.js';
import { DeliveryChannelsApi } from './api/delivery-channels.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * URL prefix a path is resolved against:
 * - project: {baseUrl}/account/{account}/project/{project}
 * - account: {baseUrl}/account/{account}
 * - api: {baseUrl}
 */
export type Scope = 'project' | 'account' | 'api';

export interface SendOptions {
  body?: unknown;
  query?: Record<string, QueryValue>;
  scope?: Scope;
}

export type TenderlyClientOptions =
  | (ConfigOptions & { logger?: Logger })
  | { config: TenderlyConfig; logger?: Logger };

export class TenderlyClient {
  readonly config: TenderlyConfig;
  private readonly http: HttpClient;

  private readonly simulationsApi: SimulationsApi;
  private readonly vnetsApi: VNetsApi;
  private readonly contractsApi: ContractsApi;
  private readonly walletsApi: WalletsApi;
  private readonly networksApi: NetworksApi;
  private readonly alertsApi: AlertsApi;
  private readonly actionsApi: ActionsApi;
  private readonly deliveryChannelsApi: DeliveryChannelsApi;

  constructor(options: TenderlyClientOptions) {
    if ('config' in options) {
      this.config = options.config;
    } else {
      this.config = createConfig(options);
    }
    this.http = new HttpClient(this.config.timeout, options.logger);

    this.simulationsApi = new SimulationsApi(this);
    this.vnetsApi = new VNetsApi(this);
    this.contractsApi = new ContractsApi(this);
    this.walletsApi = new WalletsApi(this);
    this.networksApi = new NetworksApi(this);
    this.alertsApi = new AlertsApi(this);
    this.actionsApi = new ActionsApi(this);
    this.deliveryChannelsApi = new DeliveryChannelsApi(this);
  }

  /**
   * Build a client from TENDERLY_ACCESS_KEY, TENDERLY_ACCOUNT_SLUG and
   * TENDERLY_PROJECT_SLUG (plus optional TENDERLY_API_URL).
   */
  static fromEnv(env?: NodeJS.ProcessEnv, options?: { logger?: Logger }): TenderlyClient {
    return new TenderlyClient({ config: configFromEnv(env), logger: options?.logger });
  }

  // --- Sub-clients ---
  simulations(): SimulationsApi {
    return this.simulationsApi;
  }

  vnets(): VNetsApi {
    return this.vnetsApi;
  }

  contracts(): ContractsApi {
    return this.contractsApi;
  }

  wallets(): WalletsApi {
    return this.walletsApi;
  }

  networks(): NetworksApi {
    return this.networksApi;
  }

  alerts(): AlertsApi {
    return this.alertsApi;
  }

  actions(): ActionsApi {
    return this.actionsApi;
  }

  deliveryChannels(): DeliveryChannelsApi {
    return this.deliveryChannelsApi;
  }

  // --- Transport ---
  url(path: string, scope: Scope = 'project', query?: Record<string, QueryValue>): string {
    const { baseUrl, accountSlug, projectSlug } = this.config;
    const account = encodeURIComponent(accountSlug);
    const project = encodeURIComponent(projectSlug);
    const prefix = scope === 'api'
      ? baseUrl
      : scope === 'account'
        ? `${baseUrl}/account/${account}`
        : `${baseUrl}/account/${account}/project/${project}`;
    return `${prefix}${path}${query ? queryString(query) : ''}`;
  }

  async send<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    schema: S,
    options?: SendOptions,
  ): Promise<z.output<S>> {
    return this.http.request(method, this.url(path, options?.scope, options?.query), schema, {
      body: options?.body,
      headers: this.authHeaders(),
    });
  }

  async sendVoid(method: HttpMethod, path: string, options?: SendOptions): Promise<void> {
    return this.http.requestVoid(method, this.url(path, options?.scope, options?.query), {
      body: options?.body,
      headers: this.authHeaders(),
    });
  }

  /** One request carrying every id, shaped by the endpoint table. */
  async sendBulk(endpoint: BulkEndpoint, ids: readonly string[]): Promise<void> {
    assertNonEmpty(ids, endpoint.idsKey);
    return this.sendVoid(endpoint.method, endpoint.path, {
      body: { [endpoint.idsKey]: [...ids] },
    });
  }

  /**
   * POST a JSON-RPC envelope to an absolute RPC URL. The access key is not
   * attached: admin RPC URLs carry their own credentials.
   */
  async sendJsonRpc(url: string, request: JsonRpcRequest): Promise<JsonRpcResponse> {
    return this.http.request('POST', url, JsonRpcResponseSchema, {
      body: request,
      logTag: '[tenderly-rpc]',
      logLabel: request.method,
      mapError: rpcErrorFromBody,
    });
  }

  private authHeaders(): Record<string, string> {
    return { 'X-Access-Key': this.config.accessKey.reveal() };
  }
}

/** A JSON-RPC error envelope served with a non-2xx status is still an RPC error. */
function rpcErrorFromBody(body: unknown): TenderlyError | undefined {
  const parsed = JsonRpcResponseSchema.safeParse(body);
  if (!parsed.success || !parsed.data.error) return undefined;
  const { code, message, data } = parsed.data.error;
  return TenderlyError.rpc(code, message, data);
}
