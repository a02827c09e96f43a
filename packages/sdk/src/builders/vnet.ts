/**
 * Fluent builders for Virtual TestNet requests.
 */

import { assertAddress, assertHex, toQuantity, type Quantity } from '../validation.js';
import { TenderlyError } from '../error.js';
import type {
  CreateVNetRequest,
  ExplorerPageConfig,
  ForkVNetRequest,
  UpdateVNetRequest,
  VNetSimulateTransactionRequest,
  VNetTransactionRequest,
} from '../schemas/vnet.schema.js';

export class CreateVNetRequestBuilder {
  private readonly request: CreateVNetRequest;

  /** Forks `networkId` at the latest block; the chain id defaults to the same value. */
  constructor(slug: string, displayName: string, networkId: number) {
    this.request = {
      slug,
      display_name: displayName,
      fork_config: { network_id: networkId },
      virtual_network_config: { chain_config: { chain_id: networkId } },
    };
  }

  blockNumber(block: number): this {
    this.request.fork_config.block_number = block;
    return this;
  }

  chainId(chainId: number): this {
    this.request.virtual_network_config.chain_config.chain_id = chainId;
    return this;
  }

  baseFeePerGas(fee: number): this {
    this.request.virtual_network_config.base_fee_per_gas = fee;
    return this;
  }

  syncState(enabled: boolean): this {
    this.request.sync_state_config = { enabled };
    return this;
  }

  explorerPage(enabled: boolean, verificationVisibility = 'bytecode'): this {
    this.request.explorer_page_config = explorerPage(enabled, verificationVisibility);
    return this;
  }

  build(): CreateVNetRequest {
    if (this.request.slug.length === 0) {
      throw TenderlyError.validation('"slug" must not be empty');
    }
    return structuredClone(this.request);
  }
}

export class UpdateVNetRequestBuilder {
  private readonly request: UpdateVNetRequest = {};

  displayName(name: string): this {
    this.request.display_name = name;
    return this;
  }

  slug(slug: string): this {
    this.request.slug = slug;
    return this;
  }

  syncState(enabled: boolean): this {
    this.request.sync_state_config = { enabled };
    return this;
  }

  explorerPage(enabled: boolean, verificationVisibility = 'bytecode'): this {
    this.request.explorer_page_config = explorerPage(enabled, verificationVisibility);
    return this;
  }

  build(): UpdateVNetRequest {
    if (Object.keys(this.request).length === 0) {
      throw TenderlyError.validation('Update request has no fields set');
    }
    return structuredClone(this.request);
  }
}

export class ForkVNetRequestBuilder {
  private readonly request: ForkVNetRequest;

  constructor(sourceVNetId: string, slug: string, displayName: string) {
    this.request = { srcTestnetId: sourceVNetId, slug, display_name: displayName };
  }

  blockNumber(block: number): this {
    this.request.block_number = block;
    return this;
  }

  build(): ForkVNetRequest {
    if (this.request.srcTestnetId.length === 0) {
      throw TenderlyError.validation('"srcTestnetId" must not be empty');
    }
    return { ...this.request };
  }
}

/**
 * Transaction to send or simulate on a VNet.
 * Setting either EIP-1559 fee switches the transaction to type 2.
 */
export class VNetTransactionRequestBuilder {
  private readonly from: string;
  private readonly to: string;
  private input?: string;
  private valueWei?: Quantity;
  private gasLimit?: number;
  private gasPriceWei?: Quantity;
  private maxFee?: Quantity;
  private maxPriorityFee?: Quantity;
  private txNonce?: number;
  private txType?: 0 | 1 | 2;
  private accessList?: Array<{ address: string; storageKeys: string[] }>;

  constructor(from: string, to: string, input?: string) {
    this.from = from;
    this.to = to;
    this.input = input;
  }

  /** Plain native-currency transfer without calldata. */
  static transfer(from: string, to: string, wei: Quantity): VNetTransactionRequestBuilder {
    return new VNetTransactionRequestBuilder(from, to).value(wei);
  }

  data(input: string): this {
    this.input = input;
    return this;
  }

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

  maxFeePerGas(wei: Quantity): this {
    this.maxFee = wei;
    this.txType = 2;
    return this;
  }

  maxPriorityFeePerGas(wei: Quantity): this {
    this.maxPriorityFee = wei;
    this.txType = 2;
    return this;
  }

  nonce(nonce: number): this {
    this.txNonce = nonce;
    return this;
  }

  transactionType(type: 0 | 1 | 2): this {
    this.txType = type;
    return this;
  }

  addAccessListEntry(address: string, storageKeys: string[] = []): this {
    (this.accessList ??= []).push({ address, storageKeys });
    return this;
  }

  build(): VNetTransactionRequest {
    const request: VNetTransactionRequest = {
      from: assertAddress(this.from, 'from'),
      to: assertAddress(this.to, 'to'),
    };
    if (this.input !== undefined) request.input = assertHex(this.input, 'input');
    if (this.valueWei !== undefined) request.value = toQuantity(this.valueWei, 'value');
    if (this.gasLimit !== undefined) request.gas = this.gasLimit;
    if (this.gasPriceWei !== undefined) request.gas_price = toQuantity(this.gasPriceWei, 'gas_price');
    if (this.maxFee !== undefined) request.max_fee_per_gas = toQuantity(this.maxFee, 'max_fee_per_gas');
    if (this.maxPriorityFee !== undefined) {
      request.max_priority_fee_per_gas = toQuantity(this.maxPriorityFee, 'max_priority_fee_per_gas');
    }
    if (this.txNonce !== undefined) request.nonce = this.txNonce;
    if (this.txType !== undefined) request.type = this.txType;
    if (this.accessList) {
      request.access_list = this.accessList.map((entry) => ({
        address: assertAddress(entry.address, 'access_list.address'),
        storage_keys: entry.storageKeys.map((key) => assertHex(key, 'access_list.storage_keys')),
      }));
    }
    return request;
  }

  /**
   * Same as build(), for VNetsApi.simulateTransaction.
   * @throws TenderlyError (VALIDATION) when no calldata was set
   */
  buildSimulation(): VNetSimulateTransactionRequest {
    const request = this.build();
    if (request.input === undefined) {
      throw TenderlyError.validation('"input" is required to simulate a transaction');
    }
    return { ...request, input: request.input };
  }
}

function explorerPage(enabled: boolean, verificationVisibility: string): ExplorerPageConfig {
  return { enabled, verification_visibility: verificationVisibility };
}
