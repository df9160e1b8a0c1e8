import { pino } from 'pino';
import { DEFAULT_COLLATERAL_ASSET, RATE_BASE } from '@lendbook/ledger';
import { createEnvironment, type KeeperEnvironment } from '../src/environment';
import { KeeperSentinel, type KeeperSentinelConfig } from '../src/sentinel';
import { PositionStorage } from '../src/storage';
import { createKeeperAPI } from '../src/api';

export const logger = pino({ level: 'silent' });

export interface TestKeeper extends KeeperEnvironment {
  storage: PositionStorage;
  sentinel: KeeperSentinel;
  app: ReturnType<typeof createKeeperAPI>;
}

/**
 * Keeper wired to an in-memory ledger at rate 2 with 1,000,000 base in the vault
 * and 1,000 collateral in custody reserve
 */
export function createTestKeeper(overrides: Partial<KeeperSentinelConfig> = {}): TestKeeper {
  const env = createEnvironment(
    {
      collateralAssetId: DEFAULT_COLLATERAL_ASSET,
      initialRate: 2n * RATE_BASE,
      vaultLiquidity: 1_000_000n,
      custodyLiquidity: 1_000n,
    },
    logger
  );
  const storage = new PositionStorage();
  const sentinel = new KeeperSentinel(
    env.ledger,
    storage,
    {
      syncInterval: 60_000,
      keeperAddress: 'keeper',
      budget: 1_000_000n,
      autoLiquidate: true,
      ...overrides,
    },
    logger
  );
  const app = createKeeperAPI(env, storage, sentinel, logger, {
    collateralAssetId: DEFAULT_COLLATERAL_ASSET,
  });
  return { ...env, storage, sentinel, app };
}

/**
 * Mint, deposit and borrow for a participant
 */
export function openPosition(k: TestKeeper, participant: string, collateral: bigint, loan: bigint): void {
  k.custody.mint(participant, collateral);
  k.ledger.deposit({ caller: participant }, 'collateral', collateral);
  k.ledger.borrow({ caller: participant }, loan);
}

export function setRate(k: TestKeeper, rate: bigint): void {
  k.oracle.setRate(DEFAULT_COLLATERAL_ASSET, rate);
}
