import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { TenderlyError } from '../error.js';
import { ADDR_A, ADDR_B, callAt, createTestClient, respondWith, stubFetch, vnetFixture } from './helpers.js';
import { VNetSchema } from '../schemas/vnet.schema.js';

const ADMIN_URL = 'https://virtual.mainnet.rpc.tenderly.test/admin-abc';

function adminClient(logger?: { debug(message: string): void }) {
  const client = createTestClient(logger);
  return client.vnets().admin(VNetSchema.parse(vnetFixture()));
}

function rpcResult(fetchSpy: Mock, id: number, result: unknown): void {
  respondWith(fetchSpy, { jsonrpc: '2.0', id, result });
}

describe('AdminRpc', () => {
  let fetchSpy: Mock;

  beforeEach(() => {
    fetchSpy = stubFetch();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should POST a JSON-RPC 2.0 envelope to the admin URL', async () => {
    const admin = adminClient();
    rpcResult(fetchSpy, 1, '0xe10');

    const result = await admin.increaseTime(3600);

    expect(result).toBe('0xe10');
    const call = callAt(fetchSpy);
    expect(call.url).toBe(ADMIN_URL);
    expect(call.method).toBe('POST');
    expect(call.body).toEqual({ jsonrpc: '2.0', id: 1, method: 'evm_increaseTime', params: ['0xe10'] });
  });

  it('should not send the access key to the RPC endpoint', async () => {
    const admin = adminClient();
    rpcResult(fetchSpy, 1, '0x1');

    await admin.increaseBlocks(1);

    expect(callAt(fetchSpy).headers.get('x-access-key')).toBeNull();
  });

  it('should increment request ids', async () => {
    const admin = adminClient();
    rpcResult(fetchSpy, 1, '0x1');
    rpcResult(fetchSpy, 2, '0x2');

    await admin.increaseBlocks(1);
    await admin.setNextBlockTimestamp(1_700_000_000);

    expect(callAt(fetchSpy, 0).body).toMatchObject({ id: 1 });
    expect(callAt(fetchSpy, 1).body).toEqual({
      jsonrpc: '2.0',
      id: 2,
      method: 'evm_setNextBlockTimestamp',
      params: ['0x6553f100'],
    });
  });

  it('should send balances as an address list and a hex amount', async () => {
    const admin = adminClient();
    rpcResult(fetchSpy, 1, '0xabc');
    rpcResult(fetchSpy, 2, null);

    await admin.setBalance([ADDR_A, ADDR_B], 10n ** 18n);
    await admin.addBalance(ADDR_A, 1);

    expect(callAt(fetchSpy, 0).body).toMatchObject({
      method: 'tenderly_setBalance',
      params: [[ADDR_A, ADDR_B], '0xde0b6b3a7640000'],
    });
    expect(callAt(fetchSpy, 1).body).toMatchObject({
      method: 'tenderly_addBalance',
      params: [[ADDR_A], '0x1'],
    });
  });

  it('should set an ERC-20 balance', async () => {
    const admin = adminClient();
    rpcResult(fetchSpy, 1, null);

    await expect(admin.setErc20Balance(ADDR_A, ADDR_B, 500)).resolves.toBeNull();
    expect(callAt(fetchSpy).body).toMatchObject({
      method: 'tenderly_setErc20Balance',
      params: [ADDR_A, ADDR_B, '0x1f4'],
    });
  });

  it('should pad storage slot and value to 32 bytes', async () => {
    const admin = adminClient();
    rpcResult(fetchSpy, 1, null);

    await admin.setStorageAt(ADDR_A, '0x2', '0xff');

    expect(callAt(fetchSpy).body).toMatchObject({
      method: 'tenderly_setStorageAt',
      params: [
        ADDR_A,
        '0x0000000000000000000000000000000000000000000000000000000000000002',
        '0x00000000000000000000000000000000000000000000000000000000000000ff',
      ],
    });
  });

  it('should set code', async () => {
    const admin = adminClient();
    rpcResult(fetchSpy, 1, null);

    await admin.setCode(ADDR_A, '0x6080');

    expect(callAt(fetchSpy).body).toMatchObject({ method: 'tenderly_setCode', params: [ADDR_A, '0x6080'] });
  });

  it('should take a snapshot and revert to it', async () => {
    const admin = adminClient();
    rpcResult(fetchSpy, 1, '0x3f2a');
    rpcResult(fetchSpy, 2, true);

    const snapshotId = await admin.snapshot();
    const reverted = await admin.revert(snapshotId);

    expect(snapshotId).toBe('0x3f2a');
    expect(reverted).toBe(true);
    expect(callAt(fetchSpy, 0).body).toMatchObject({ method: 'evm_snapshot', params: [] });
    expect(callAt(fetchSpy, 1).body).toMatchObject({ method: 'evm_revert', params: ['0x3f2a'] });
  });

  it('should surface a JSON-RPC error for an unknown snapshot', async () => {
    const admin = adminClient();
    respondWith(fetchSpy, { jsonrpc: '2.0', id: 1, error: { code: -32000, message: 'snapshot not found' } });

    const err = await admin.revert('0xdead').then(
      () => undefined,
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(TenderlyError);
    expect(err).toMatchObject({ kind: 'RPC', rpcCode: -32000, message: 'snapshot not found' });
  });

  it('should surface a JSON-RPC error served with a non-2xx status', async () => {
    const admin = adminClient();
    respondWith(fetchSpy, { jsonrpc: '2.0', id: 1, error: { code: -32602, message: 'invalid snapshot id' } }, 400);

    await expect(admin.revert('0xdead')).rejects.toMatchObject({
      kind: 'RPC',
      code: 'RPC_ERROR',
      rpcCode: -32602,
      message: 'invalid snapshot id',
    });
  });

  it('should keep plain HTTP errors from the RPC endpoint', async () => {
    const admin = adminClient();
    respondWith(fetchSpy, { error: { slug: 'forbidden', message: 'Forbidden' } }, 403);

    await expect(admin.snapshot()).rejects.toMatchObject({ kind: 'HTTP', status: 403, code: 'forbidden' });
  });

  it('should reject an invalid address without a request', async () => {
    const admin = adminClient();

    await expect(admin.setBalance('0x12', 1)).rejects.toMatchObject({ code: 'INVALID_ADDRESS' });
    await expect(admin.setBalance([], 1)).rejects.toMatchObject({ code: 'INVALID_ADDRESS' });
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('should fail with DECODE when the result has the wrong type', async () => {
    const admin = adminClient();
    rpcResult(fetchSpy, 1, 42);

    await expect(admin.snapshot()).rejects.toMatchObject({ kind: 'DECODE' });
  });

  it('should fail with DECODE when neither result nor error is present', async () => {
    const admin = adminClient();
    respondWith(fetchSpy, { jsonrpc: '2.0', id: 1 });

    await expect(admin.snapshot()).rejects.toMatchObject({
      kind: 'DECODE',
      message: 'evm_snapshot: response has neither result nor error',
    });
  });

  it('should log the RPC method instead of the URL', async () => {
    const lines: string[] = [];
    const admin = adminClient({ debug: (line) => lines.push(line) });
    rpcResult(fetchSpy, 1, '0x1');

    await admin.increaseBlocks(1);

    expect(lines[0]).toMatch(/^\[tenderly-rpc\] evm_increaseBlocks 200 \d+ms$/);
  });
});
