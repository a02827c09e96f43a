import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { ADDR_A, PROJECT_URL, TEST_BASE_URL, callAt, createTestClient, respondEmpty, respondWith, stubFetch } from './helpers.js';

const contractBody = {
  id: 'eth:1:0x1111111111111111111111111111111111111111',
  account_type: 'contract',
  display_name: 'Vault',
  network_id: '1',
  address: ADDR_A,
  tags: [{ tag: 'core' }],
};

describe('ContractsApi', () => {
  let fetchSpy: Mock;

  beforeEach(() => {
    fetchSpy = stubFetch();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should list contracts filtered by account type', async () => {
    const client = createTestClient();
    respondWith(fetchSpy, [contractBody]);

    const contracts = await client.contracts().list();

    expect(contracts[0]?.display_name).toBe('Vault');
    expect(callAt(fetchSpy).url).toBe(`${PROJECT_URL}/contracts?accountType=contract`);
  });

  it('should decode unknown account types as unknown', async () => {
    const client = createTestClient();
    respondWith(fetchSpy, [{ ...contractBody, account_type: 'multisig' }]);

    const contracts = await client.contracts().list();

    expect(contracts[0]?.account_type).toBe('unknown');
  });

  it('should get a contract by network and address', async () => {
    const client = createTestClient();
    respondWith(fetchSpy, contractBody);

    await client.contracts().get('1', ADDR_A);

    expect(callAt(fetchSpy).url).toBe(`${PROJECT_URL}/contract/1/${ADDR_A}`);
  });

  it('should add a contract', async () => {
    const client = createTestClient();
    respondWith(fetchSpy, contractBody);

    await client.contracts().add({ network_id: '1', address: ADDR_A, display_name: 'Vault' });

    const call = callAt(fetchSpy);
    expect(call.url).toBe(`${PROJECT_URL}/address`);
    expect(call.body).toEqual({ network_id: '1', address: ADDR_A, display_name: 'Vault' });
  });

  it('should rename and tag', async () => {
    const client = createTestClient();
    respondEmpty(fetchSpy);
    respondEmpty(fetchSpy);

    await client.contracts().rename('1', ADDR_A, 'Vault v2');
    await client.contracts().tag('1', ADDR_A, 'audited');

    expect(callAt(fetchSpy, 0).url).toBe(`${PROJECT_URL}/contract/1/${ADDR_A}/rename`);
    expect(callAt(fetchSpy, 0).body).toEqual({ display_name: 'Vault v2' });
    expect(callAt(fetchSpy, 1).url).toBe(`${PROJECT_URL}/contract/1/${ADDR_A}/tag`);
    expect(callAt(fetchSpy, 1).body).toEqual({ tag: 'audited' });
  });

  it('should delete a contract', async () => {
    const client = createTestClient();
    respondEmpty(fetchSpy);

    await client.contracts().delete('1', ADDR_A);

    expect(callAt(fetchSpy).method).toBe('DELETE');
  });

  it('should reject a malformed address without a request', async () => {
    const client = createTestClient();

    await expect(client.contracts().get('1', '0x12')).rejects.toMatchObject({ code: 'INVALID_ADDRESS' });
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('should submit verification requests', async () => {
    const client = createTestClient();
    respondWith(fetchSpy, { contracts: [{ address: ADDR_A }], bytecode_mismatch_errors: [] });

    const result = await client.contracts().verify({
      contracts: [{
        contractName: 'Vault',
        source: 'contract Vault {}',
        sourcePath: 'contracts/Vault.sol',
        networks: { '1': { address: ADDR_A } },
        compiler: { version: '0.8.24' },
      }],
    });

    expect(result.contracts).toHaveLength(1);
    expect(callAt(fetchSpy).url).toBe(`${PROJECT_URL}/contracts/verify`);
  });
});

describe('WalletsApi', () => {
  let fetchSpy: Mock;

  beforeEach(() => {
    fetchSpy = stubFetch();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should list wallets filtered by account type', async () => {
    const client = createTestClient();
    respondWith(fetchSpy, [{ ...contractBody, account_type: 'wallet' }]);

    const wallets = await client.wallets().list();

    expect(wallets[0]?.account_type).toBe('wallet');
    expect(callAt(fetchSpy).url).toBe(`${PROJECT_URL}/contracts?accountType=wallet`);
  });

  it('should get a wallet by address and network', async () => {
    const client = createTestClient();
    respondWith(fetchSpy, contractBody);

    await client.wallets().get('1', ADDR_A);

    expect(callAt(fetchSpy).url).toBe(`${PROJECT_URL}/wallet/${ADDR_A}/network/1`);
  });

  it('should add a wallet on several networks', async () => {
    const client = createTestClient();
    respondWith(fetchSpy, contractBody);

    await client.wallets().add({ address: ADDR_A, network_ids: ['1', '10'] });

    const call = callAt(fetchSpy);
    expect(call.url).toBe(`${PROJECT_URL}/wallet`);
    expect(call.body).toEqual({ address: ADDR_A, network_ids: ['1', '10'] });
  });

  it('should require at least one network', async () => {
    const client = createTestClient();

    await expect(client.wallets().add({ address: ADDR_A, network_ids: [] })).rejects.toMatchObject({
      kind: 'VALIDATION',
    });
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});

describe('NetworksApi', () => {
  let fetchSpy: Mock;

  beforeEach(() => {
    fetchSpy = stubFetch();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const networks = [
    { id: '1', ethereum_network_id: 1, name: 'Mainnet', slug: 'mainnet' },
    { id: '8453', ethereum_network_id: 8453, name: 'Base', slug: 'base' },
  ];

  it('should list networks outside the project scope', async () => {
    const client = createTestClient();
    respondWith(fetchSpy, networks);

    const list = await client.networks().list();

    expect(list.map((n) => n.name)).toEqual(['Mainnet', 'Base']);
    expect(callAt(fetchSpy).url).toBe(`${TEST_BASE_URL}/public-networks`);
  });

  it('should find a network by id', async () => {
    const client = createTestClient();
    respondWith(fetchSpy, networks);

    await expect(client.networks().get(8453)).resolves.toMatchObject({ name: 'Base' });
  });

  it('should resolve undefined for an unsupported network', async () => {
    const client = createTestClient();
    respondWith(fetchSpy, networks);

    await expect(client.networks().get('999')).resolves.toBeUndefined();
  });
});
