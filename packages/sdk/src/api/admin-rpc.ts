/**
 * AdminRpc - JSON-RPC 2.0 client for a Virtual TestNet's admin endpoint.
 *
 * Each method is one fixed RPC method with an ordered parameter list:
 * - time: increaseTime, setNextBlockTimestamp, increaseBlocks
 * - balances: setBalance, addBalance, setErc20Balance
 * - storage: setStorageAt, setCode
 * - snapshots: snapshot, revert
 *
 * One request per call, no batching. Snapshot ids are not tracked locally;
 * reverting to an unknown id surfaces the service's JSON-RPC error.
 */

import { z } from 'zod';
import type { Address, Hex } from 'viem';
import type { TenderlyClient } from '../client.js';
import { TenderlyError } from '../error.js';
import { HexSchema } from '../schemas/common.js';
import { assertAddress, assertHex, toQuantity, toStorageWord, type Quantity } from '../validation.js';

const MutationResultSchema = HexSchema.nullable();

export class AdminRpc {
  readonly url: string;
  private readonly client: TenderlyClient;
  private nextId = 1;

  constructor(client: TenderlyClient, url: string) {
    this.client = client;
    this.url = url;
  }

  // --- Time ---
  async increaseTime(seconds: Quantity): Promise<Hex> {
    return this.call('evm_increaseTime', [toQuantity(seconds, 'seconds')], HexSchema);
  }

  async setNextBlockTimestamp(timestamp: Quantity): Promise<Hex> {
    return this.call('evm_setNextBlockTimestamp', [toQuantity(timestamp, 'timestamp')], HexSchema);
  }

  /** Mine `blocks` empty blocks. */
  async increaseBlocks(blocks: Quantity): Promise<Hex> {
    return this.call('evm_increaseBlocks', [toQuantity(blocks, 'blocks')], HexSchema);
  }

  // --- Balances ---
  async setBalance(addresses: string | string[], wei: Quantity): Promise<Hex | null> {
    return this.call('tenderly_setBalance', [toAddressList(addresses), toQuantity(wei, 'wei')], MutationResultSchema);
  }

  async addBalance(addresses: string | string[], wei: Quantity): Promise<Hex | null> {
    return this.call('tenderly_addBalance', [toAddressList(addresses), toQuantity(wei, 'wei')], MutationResultSchema);
  }

  async setErc20Balance(token: string, wallet: string, amount: Quantity): Promise<Hex | null> {
    return this.call(
      'tenderly_setErc20Balance',
      [assertAddress(token, 'token'), assertAddress(wallet, 'wallet'), toQuantity(amount, 'amount')],
      MutationResultSchema,
    );
  }

  // --- Storage ---
  async setStorageAt(address: string, slot: string, value: string): Promise<Hex | null> {
    return this.call(
      'tenderly_setStorageAt',
      [assertAddress(address, 'address'), toStorageWord(slot, 'slot'), toStorageWord(value, 'value')],
      MutationResultSchema,
    );
  }

  async setCode(address: string, bytecode: string): Promise<Hex | null> {
    return this.call(
      'tenderly_setCode',
      [assertAddress(address, 'address'), assertHex(bytecode, 'bytecode')],
      MutationResultSchema,
    );
  }

  // --- Snapshots ---
  /** Resolves to an opaque id for revert(). */
  async snapshot(): Promise<string> {
    return this.call('evm_snapshot', [], z.string());
  }

  async revert(snapshotId: string): Promise<boolean> {
    return this.call('evm_revert', [snapshotId], z.boolean());
  }

  /**
   * Send a raw admin RPC method and decode its result.
   * @throws TenderlyError (RPC) when the response carries an error object
   */
  async call<S extends z.ZodTypeAny>(method: string, params: unknown[], schema: S): Promise<z.output<S>> {
    const id = this.nextId++;
    const response = await this.client.sendJsonRpc(this.url, { jsonrpc: '2.0', id, method, params });

    if (response.error) {
      throw TenderlyError.rpc(response.error.code, response.error.message, response.error.data);
    }
    if (!('result' in response)) {
      throw TenderlyError.decode(`${method}: response has neither result nor error`, 200);
    }

    const parsed = schema.safeParse(response.result);
    if (!parsed.success) {
      throw TenderlyError.decode(`${method}: unexpected result ${JSON.stringify(response.result)}`, 200);
    }
    return parsed.data;
  }
}

function toAddressList(addresses: string | string[]): Address[] {
  const list = Array.isArray(addresses) ? addresses : [addresses];
  if (list.length === 0) {
    throw TenderlyError.validation('"addresses" must contain at least one address', 'INVALID_ADDRESS');
  }
  return list.map((a) => assertAddress(a, 'address'));
}
