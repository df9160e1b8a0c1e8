import { beforeEach, describe, test } from 'node:test';
import { expect } from 'expect';
import { MAX_UINT256 } from '@lendbook/ledger';
import { createTestKeeper, type TestKeeper } from './helpers';

describe('Keeper API', () => {
  let k: TestKeeper;

  beforeEach(() => {
    k = createTestKeeper();
  });

  const post = (path: string, body: unknown, method: string = 'POST') =>
    k.app.request(path, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

  // alice: 150 collateral at rate 2, borrows the maximum 200
  async function openAlicePosition() {
    await post('/faucet', { participant: 'alice', amount: '150' });
    await post('/ledger/deposit', { caller: 'alice', kind: 'collateral', amount: '150' });
    return post('/ledger/borrow', { caller: 'alice', amount: '0' });
  }

  test('GET /health', async () => {
    const res = await k.app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'healthy',
      service: 'keeper',
      tick: '1',
      trackedPositions: 0,
      sentinel: { isRunning: false, cycles: 0 },
    });
  });

  test('GET /rate', async () => {
    const res = await k.app.request('/rate');

    expect(await res.json()).toMatchObject({
      asset: 'CLT',
      rate: 2,
      scaledRate: '2000000000000000000',
    });
  });

  test('faucet, deposit and borrow', async () => {
    const faucet = await post('/faucet', { participant: 'alice', amount: '150' });
    expect(faucet.status).toBe(201);
    expect(await faucet.json()).toEqual({ success: true, participant: 'alice', walletBalance: '150' });

    const deposit = await post('/ledger/deposit', { caller: 'alice', kind: 'collateral', amount: '150' });
    expect(deposit.status).toBe(200);
    expect(await deposit.json()).toEqual({ success: true });

    // floor(150 * 2 * 100 / 150) = 200
    const borrow = await post('/ledger/borrow', { caller: 'alice', amount: '0' });
    expect(await borrow.json()).toEqual({
      success: true,
      collateralRatio: '15000',
      collateralRatioPercent: '150.00%',
    });

    const balance = await k.app.request('/balances/alice/collateral');
    expect(await balance.json()).toEqual({ participant: 'alice', kind: 'collateral', balance: '150' });

    const ratio = await k.app.request('/ratio/alice');
    expect(await ratio.json()).toEqual({
      participant: 'alice',
      collateralRatio: '15000',
      collateralRatioPercent: '150.00%',
    });
  });

  test('repay and base deposits', async () => {
    await openAlicePosition();

    const repay = await post('/ledger/repay', { caller: 'alice', amount: '50', value: '50' });
    expect(await repay.json()).toEqual({ success: true, remainingPrincipal: '150' });

    await post('/ledger/deposit', { caller: 'carol', kind: 'base', amount: '100', value: '100' });
    const withdraw = await post('/ledger/withdraw', { caller: 'carol', kind: 'base', amount: '0' });
    expect(await withdraw.json()).toEqual({ success: true, remaining: '0' });
    expect(k.vault.paidTo('carol')).toBe(100n);
  });

  test('maps ledger errors to statuses', async () => {
    const borrow = await post('/ledger/borrow', { caller: 'bob', amount: '10' });
    expect(borrow.status).toBe(409);
    expect(await borrow.json()).toMatchObject({ success: false, error: { code: 'NoCollateral' } });

    const balance = await k.app.request('/balances/alice/loan');
    expect(balance.status).toBe(400);
    expect(await balance.json()).toMatchObject({ error: { code: 'UnsupportedAsset' } });

    // nothing minted, so custody refuses the pull
    const deposit = await post('/ledger/deposit', { caller: 'bob', kind: 'collateral', amount: '10' });
    expect(deposit.status).toBe(502);
    expect(await deposit.json()).toMatchObject({ error: { code: 'TransferRejected' } });
  });

  test('rejects malformed requests', async () => {
    const amount = await post('/ledger/deposit', { caller: 'alice', kind: 'collateral', amount: 'abc' });
    expect(amount.status).toBe(400);
    expect(await amount.json()).toMatchObject({
      success: false,
      error: { code: 'BadRequest', message: 'Invalid amount. Must be a non-negative integer' },
    });

    const caller = await post('/ledger/borrow', { caller: 'two words', amount: '1' });
    expect(caller.status).toBe(400);

    const rate = await post('/rate', { rate: -1 }, 'PUT');
    expect(rate.status).toBe(400);

    const history = await k.app.request('/liquidations?limit=0');
    expect(history.status).toBe(400);
  });

  test('manual liquidation of a healthy position is refused', async () => {
    await openAlicePosition();

    const res = await post('/ledger/liquidate', { caller: 'bob', target: 'alice', value: '200' });

    expect(res.status).toBe(409);
    expect(await res.json()).toMatchObject({ error: { code: 'HealthyPosition' } });
  });

  test('a rate drop triggers keeper liquidation', async () => {
    await openAlicePosition();

    // ratio floor(150 * 1.8 * 10000 / 200) = 13500
    const rate = await post('/rate', { rate: '1.8' }, 'PUT');
    expect(await rate.json()).toEqual({
      success: true,
      asset: 'CLT',
      rate: 1.8,
      sync: { scanned: 1, liquidatable: 1, liquidated: 1, failed: 0 },
    });

    const history = await k.app.request('/liquidations');
    expect(await history.json()).toMatchObject({
      total: 1,
      liquidations: [
        {
          target: 'alice',
          success: true,
          tick: '1',
          result: {
            liquidator: 'keeper',
            target: 'alice',
            collateralSeized: '111',
            loanAmount: '200',
            valuePaid: '200',
          },
        },
      ],
    });

    const position = await k.app.request('/positions/alice');
    expect(await position.json()).toMatchObject({
      position: {
        participant: 'alice',
        collateral: '39',
        loan: '0',
        collateralRatio: MAX_UINT256.toString(),
        collateralRatioPercent: 'inf',
        liquidatable: false,
      },
      tick: '1',
    });
  });

  test('PUT /rate takes a JSON number at its exact decimal value', async () => {
    const res = await post('/rate', { rate: 0.9 }, 'PUT');
    expect(res.status).toBe(200);

    const rate = await k.app.request('/rate');
    expect(await rate.json()).toMatchObject({ rate: 0.9, scaledRate: '900000000000000000' });
  });

  test('collateral with accrued interest can be withdrawn in full', async () => {
    await post('/faucet', { participant: 'dave', amount: '100' });
    await post('/ledger/deposit', { caller: 'dave', kind: 'collateral', amount: '100' });
    k.clock.advance(100n);

    const withdraw = await post('/ledger/withdraw', { caller: 'dave', kind: 'collateral', amount: '0' });
    expect(withdraw.status).toBe(200);
    expect(await withdraw.json()).toEqual({ success: true, remaining: '0' });
    expect(k.custody.balanceOf('dave')).toBe(103n);
  });

  test('GET /positions lists synced snapshots', async () => {
    await openAlicePosition();
    await post('/sync', {});

    const res = await k.app.request('/positions');
    expect(await res.json()).toMatchObject({
      total: 1,
      positions: [{ participant: 'alice', collateral: '150', loan: '200', tick: '1' }],
    });

    const liquidatable = await k.app.request('/positions?liquidatable=true');
    expect(await liquidatable.json()).toEqual({ positions: [], total: 0 });
  });

  test('POST /sync runs a cycle', async () => {
    const res = await post('/sync', {});
    expect(await res.json()).toEqual({
      success: true,
      summary: { scanned: 0, liquidatable: 0, liquidated: 0, failed: 0 },
    });
  });

  test('GET /stats', async () => {
    await openAlicePosition();

    const res = await k.app.request('/stats');
    expect(await res.json()).toMatchObject({
      tick: '1',
      vaultBalance: '999800',
      custodyBalance: '1150',
      tables: {
        collateral: { records: 1, nonZero: 1 },
        base: { records: 0, nonZero: 0 },
        loan: { records: 1, nonZero: 1 },
      },
      trackedPositions: 0,
    });
  });
});
