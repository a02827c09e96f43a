/**
 * Fluent builders for simulation requests.
 *
 * Setters only record values; build() validates addresses and hex fields and
 * encodes quantities, so a malformed request fails before any network call.
 */

import type { Address, Hex } from 'viem';
import { assertAddress, assertHex, toQuantity, toStorageWord, type Quantity } from '../validation.js';
import type {
  BundleSimulationRequest,
  SimulationRequest,
  SimulationType,
  StateOverride,
} from '../schemas/simulation.schema.js';

interface OverrideDraft {
  balance?: Quantity;
  code?: string;
  storage: Array<[slot: string, value: string]>;
}

export class SimulationRequestBuilder {
  private readonly from: string;
  private readonly to: string;
  private readonly input: string;
  private network = '1';
  private valueWei?: Quantity;
  private gasLimit?: number;
  private gasPriceWei?: Quantity;
  private block?: number;
  private txIndex?: number;
  private persist = false;
  private persistIfFails?: boolean;
  private type: SimulationType = 'full';
  private estimate?: boolean;
  private accessList?: boolean;
  private readonly overrides = new Map<string, OverrideDraft>();

  constructor(from: string, to: string, input: string) {
    this.from = from;
    this.to = to;
    this.input = input;
  }

  networkId(id: string | number): this {
    this.network = String(id);
    return this;
  }

  /** Value in wei; sent as a hex quantity. */
  value(wei: Quantity): this {
    this.valueWei = wei;
    return this;
  }

  gas(limit: number): this {
    this.gasLimit = limit;
    return this;
  }

  gasPrice(wei: Quantity): this {
    this.gasPriceWei = wei;
    return this;
  }

  blockNumber(block: number): this {
    this.block = block;
    return this;
  }

  transactionIndex(index: number): this {
    this.txIndex = index;
    return this;
  }

  save(enabled = true): this {
    this.persist = enabled;
    return this;
  }

  saveIfFails(enabled = true): this {
    this.persistIfFails = enabled;
    return this;
  }

  simulationType(type: SimulationType): this {
    this.type = type;
    return this;
  }

  estimateGas(enabled = true): this {
    this.estimate = enabled;
    return this;
  }

  generateAccessList(enabled = true): this {
    this.accessList = enabled;
    return this;
  }

  overrideBalance(address: string, wei: Quantity): this {
    this.override(address).balance = wei;
    return this;
  }

  overrideStorage(address: string, slot: string, value: string): this {
    this.override(address).storage.push([slot, value]);
    return this;
  }

  overrideCode(address: string, code: string): this {
    this.override(address).code = code;
    return this;
  }

  /**
   * @throws TenderlyError (VALIDATION) on a malformed address, hex or quantity
   */
  build(): SimulationRequest {
    const request: SimulationRequest = {
      network_id: this.network,
      from: assertAddress(this.from, 'from'),
      to: assertAddress(this.to, 'to'),
      input: assertHex(this.input, 'input'),
      save: this.persist,
      simulation_type: this.type,
    };
    if (this.valueWei !== undefined) request.value = toQuantity(this.valueWei, 'value');
    if (this.gasLimit !== undefined) request.gas = this.gasLimit;
    if (this.gasPriceWei !== undefined) request.gas_price = toQuantity(this.gasPriceWei, 'gas_price');
    if (this.block !== undefined) request.block_number = this.block;
    if (this.txIndex !== undefined) request.transaction_index = this.txIndex;
    if (this.persistIfFails !== undefined) request.save_if_fails = this.persistIfFails;
    if (this.estimate !== undefined) request.estimate_gas = this.estimate;
    if (this.accessList !== undefined) request.generate_access_list = this.accessList;
    if (this.overrides.size > 0) request.state_objects = this.buildOverrides();
    return request;
  }

  private override(address: string): OverrideDraft {
    const key = address.toLowerCase();
    let draft = this.overrides.get(key);
    if (!draft) {
      draft = { storage: [] };
      this.overrides.set(key, draft);
    }
    return draft;
  }

  private buildOverrides(): Record<Address, StateOverride> {
    const result: Record<Address, StateOverride> = {};
    for (const [key, draft] of this.overrides) {
      const address = assertAddress(key, 'state_objects');
      const entry: StateOverride = {};
      if (draft.balance !== undefined) entry.balance = toQuantity(draft.balance, `state_objects.${key}.balance`);
      if (draft.code !== undefined) entry.code = assertHex(draft.code, `state_objects.${key}.code`);
      if (draft.storage.length > 0) {
        const storage: Record<Hex, Hex> = {};
        for (const [slot, value] of draft.storage) {
          storage[toStorageWord(slot, 'slot')] = toStorageWord(value, 'value');
        }
        entry.storage = storage;
      }
      result[address] = entry;
    }
    return result;
  }
}

export class BundleSimulationRequestBuilder {
  private readonly simulations: SimulationRequestBuilder[] = [];

  add(simulation: SimulationRequestBuilder): this {
    this.simulations.push(simulation);
    return this;
  }

  build(): BundleSimulationRequest {
    return { simulations: this.simulations.map((s) => s.build()) };
  }
}
