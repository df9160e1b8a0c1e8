import type { Logger } from 'pino';
import { InMemoryCustody, InMemoryVault, Ledger, ManualClock, MockPriceFeed } from '@lendbook/ledger';
import type { KeeperConfig } from './config';

export interface KeeperEnvironment {
  ledger: Ledger;
  clock: ManualClock;
  oracle: MockPriceFeed;
  custody: InMemoryCustody;
  vault: InMemoryVault;
}

/**
 * Wire a ledger to in-memory collaborators for a local run
 */
export function createEnvironment(
  config: Pick<KeeperConfig, 'collateralAssetId' | 'initialRate' | 'vaultLiquidity' | 'custodyLiquidity'>,
  logger: Logger
): KeeperEnvironment {
  const clock = new ManualClock();
  const oracle = new MockPriceFeed(logger.child({ component: 'price-feed' }));
  const custody = new InMemoryCustody(config.custodyLiquidity);
  const vault = new InMemoryVault(config.vaultLiquidity);

  oracle.setRate(config.collateralAssetId, config.initialRate);

  const ledger = new Ledger({
    oracle,
    custody,
    vault,
    clock,
    logger: logger.child({ component: 'ledger' }),
    collateralAssetId: config.collateralAssetId,
  });

  return { ledger, clock, oracle, custody, vault };
}
