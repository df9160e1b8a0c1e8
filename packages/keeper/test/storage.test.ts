import { describe, test } from 'node:test';
import { expect } from 'expect';
import { INFINITE_RATIO } from '@lendbook/ledger';
import { PositionStorage } from '../src/storage';
import type { LiquidationRecord, PositionSnapshot } from '../src/utils';

function snapshot(participant: string, collateralRatio: bigint, loan: bigint): PositionSnapshot {
  return {
    participant,
    collateral: 100n,
    base: 0n,
    loan,
    collateralRatio,
    maxAdditionalLoan: 0n,
    liquidatable: loan > 0n && collateralRatio < 15_000n,
    tick: 1n,
    syncedAt: 0,
  };
}

function attempt(target: string, success: boolean): LiquidationRecord {
  return { target, success, tick: 1n, timestamp: 0 };
}

describe('PositionStorage', () => {
  test('keeps the latest snapshot per participant', () => {
    const storage = new PositionStorage();
    storage.updatePosition(snapshot('alice', 16_000n, 10n));
    storage.updatePosition(snapshot('alice', 14_000n, 10n));

    expect(storage.getAllPositions()).toHaveLength(1);
    expect(storage.getPosition('alice')?.collateralRatio).toBe(14_000n);
    expect(storage.getPosition('bob')).toBeUndefined();
  });

  test('lists liquidatable positions, lowest ratio first', () => {
    const storage = new PositionStorage();
    storage.updatePosition(snapshot('alice', 14_000n, 10n));
    storage.updatePosition(snapshot('bob', 9_000n, 10n));
    storage.updatePosition(snapshot('carol', INFINITE_RATIO, 0n));
    storage.updatePosition(snapshot('dave', 15_000n, 10n));

    expect(storage.getLiquidatablePositions().map((p) => p.participant)).toEqual(['bob', 'alice']);
  });

  test('removes positions', () => {
    const storage = new PositionStorage();
    storage.updatePosition(snapshot('alice', 14_000n, 10n));

    expect(storage.removePosition('alice')).toBe(true);
    expect(storage.removePosition('alice')).toBe(false);
  });

  test('keeps a bounded history, newest first', () => {
    const storage = new PositionStorage(2);
    storage.recordLiquidation(attempt('alice', true));
    storage.recordLiquidation(attempt('bob', false));
    storage.recordLiquidation(attempt('carol', true));

    const { liquidations, total } = storage.getLiquidations();
    expect(total).toBe(2);
    expect(liquidations.map((record) => record.target)).toEqual(['carol', 'bob']);
  });

  test('paginates history', () => {
    const storage = new PositionStorage();
    for (const target of ['a', 'b', 'c', 'd']) {
      storage.recordLiquidation(attempt(target, true));
    }

    expect(storage.getLiquidations(2, 1).liquidations.map((record) => record.target)).toEqual(['c', 'b']);
  });

  test('reports statistics', () => {
    const storage = new PositionStorage();
    storage.updatePosition(snapshot('alice', 14_000n, 10n));
    storage.updatePosition(snapshot('bob', 20_000n, 10n));
    storage.recordLiquidation(attempt('alice', true));
    storage.recordLiquidation(attempt('alice', false));

    expect(storage.getStats()).toEqual({
      trackedPositions: 2,
      liquidatablePositions: 1,
      liquidationAttempts: 2,
      successfulLiquidations: 1,
    });
  });
});
