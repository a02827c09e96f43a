/**
 * @tenderkit/sdk - typed client for the Tenderly REST API and the Virtual
 * TestNet admin RPC.
 *
 * @example
 * ```typescript
 * import { TenderlyClient, SimulationRequestBuilder } from '@tenderkit/sdk';
 *
 * const client = TenderlyClient.fromEnv();
 *
 * const request = new SimulationRequestBuilder(
 *   '0x0000000000000000000000000000000000000000',
 *   '0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48',
 *   '0x70a08231000000000000000000000000d8da6bf26964af9d7eed9e03e53415d37aa96045',
 * ).build();
 *
 * const result = await client.simulations().simulate(request);
 * console.log(result.simulation.id, result.transaction?.status);
 * ```
 */

export { TenderlyClient } from './client.js';
export type { TenderlyClientOptions, HttpMethod, Scope, SendOptions } from './client.js';
export { createConfig, configFromEnv, SecretString } from './config.js';
export type { ConfigOptions, TenderlyConfig } from './config.js';
export { TenderlyError, isTenderlyError, ERROR_KINDS } from './error.js';
export type { TenderlyErrorKind, TenderlyErrorOptions } from './error.js';
export type { Logger } from './internal/http.js';
export { BULK_ENDPOINTS } from './internal/endpoints.js';
export type { BulkEndpoint } from './internal/endpoints.js';
export {
  isAddress,
  assertAddress,
  assertHex,
  toQuantity,
  toStorageWord,
} from './validation.js';
export type { Quantity } from './validation.js';
export * from './api/index.js';
export * from './builders/index.js';
export * from './schemas/index.js';
