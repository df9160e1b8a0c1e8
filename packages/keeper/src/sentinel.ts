import type { Logger } from 'pino';
import { isLedgerError, math, type Ledger } from '@lendbook/ledger';
import type { PositionStorage } from './storage';
import type { LiquidationRecord, PositionSnapshot, SyncSummary } from './utils';

export interface KeeperSentinelConfig {
  syncInterval: number; // milliseconds
  keeperAddress: string;
  budget: bigint; // base units the keeper may attach across all liquidations
  autoLiquidate: boolean;
}

/**
 * Keeper Sentinel
 * Periodically snapshots every ledger position and liquidates the ones
 * below the minimum collateral ratio, paying the full outstanding loan
 */
export class KeeperSentinel {
  private ledger: Ledger;
  private storage: PositionStorage;
  private config: KeeperSentinelConfig;
  private logger: Logger;
  private intervalId?: NodeJS.Timeout;
  private isRunning: boolean = false;
  private spent: bigint = 0n;
  private cycles: number = 0;
  private lastSyncAt?: number;
  private lastSummary?: SyncSummary;

  constructor(
    ledger: Ledger,
    storage: PositionStorage,
    config: KeeperSentinelConfig,
    logger: Logger
  ) {
    this.ledger = ledger;
    this.storage = storage;
    this.config = config;
    this.logger = logger;
  }

  /**
   * Start the sync loop
   */
  start(): void {
    if (this.isRunning) {
      this.logger.warn('Keeper sentinel is already running');
      return;
    }

    this.logger.info(
      {
        interval: this.config.syncInterval,
        keeper: this.config.keeperAddress,
        autoLiquidate: this.config.autoLiquidate,
      },
      'Starting keeper sentinel'
    );

    this.isRunning = true;

    // Run immediately then on interval
    this.runCycle();

    this.intervalId = setInterval(() => {
      this.runCycle();
    }, this.config.syncInterval);
  }

  /**
   * Stop the sync loop
   */
  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
    }

    this.isRunning = false;
    this.logger.info('Keeper sentinel stopped');
  }

  /**
   * Snapshot every participant and liquidate what is eligible
   */
  runCycle(): SyncSummary {
    const summary: SyncSummary = { scanned: 0, liquidatable: 0, liquidated: 0, failed: 0 };
    const tick = this.ledger.getStats().tick;

    for (const participant of this.ledger.getParticipants()) {
      let snapshot: PositionSnapshot;
      try {
        snapshot = { ...this.ledger.getPosition(participant), tick, syncedAt: Date.now() };
      } catch (error) {
        summary.failed++;
        this.logger.error({ error, participant }, 'Failed to read position');
        continue;
      }

      this.storage.updatePosition(snapshot);
      summary.scanned++;

      if (!snapshot.liquidatable || participant === this.config.keeperAddress) {
        continue;
      }
      summary.liquidatable++;

      if (!this.config.autoLiquidate) {
        this.logger.info(
          { participant, collateralRatio: snapshot.collateralRatio.toString() },
          'Position is liquidatable, auto-liquidation disabled'
        );
        continue;
      }

      if (this.tryLiquidate(participant, tick)) {
        summary.liquidated++;
      } else {
        summary.failed++;
      }
    }

    this.cycles++;
    this.lastSyncAt = Date.now();
    this.lastSummary = summary;

    if (summary.liquidatable > 0 || summary.failed > 0) {
      this.logger.info(summary, 'Sync cycle complete');
    } else {
      this.logger.debug(summary, 'Sync cycle complete');
    }

    return summary;
  }

  /**
   * Run one cycle on demand (admin endpoint)
   */
  forceSync(): SyncSummary {
    this.logger.info('Forced sync requested');
    return this.runCycle();
  }

  /**
   * React to a collateral rate change by re-checking every position
   */
  handleRateUpdate(rate: bigint): SyncSummary {
    this.logger.info({ rate: math.rateToDecimal(rate) }, 'Rate update received');
    return this.runCycle();
  }

  getStatus() {
    return {
      isRunning: this.isRunning,
      syncInterval: this.config.syncInterval,
      keeperAddress: this.config.keeperAddress,
      autoLiquidate: this.config.autoLiquidate,
      cycles: this.cycles,
      lastSyncAt: this.lastSyncAt,
      lastSummary: this.lastSummary,
      spent: this.spent.toString(),
      budgetRemaining: (this.config.budget - this.spent).toString(),
    };
  }

  /**
   * Liquidate one position, attaching the exact outstanding loan
   * @returns whether the liquidation went through
   */
  private tryLiquidate(target: string, tick: bigint): boolean {
    const loan = this.ledger.getLoanBalance(target);
    const remaining = this.config.budget - this.spent;

    if (loan > remaining) {
      this.logger.warn(
        { target, loan: loan.toString(), budgetRemaining: remaining.toString() },
        'Keeper budget cannot cover liquidation'
      );
      this.record({
        target,
        success: false,
        tick,
        timestamp: Date.now(),
        error: 'Keeper budget exhausted',
      });
      return false;
    }

    try {
      const result = this.ledger.liquidate({ caller: this.config.keeperAddress, value: loan }, target);
      this.spent += result.valuePaid;
      this.record({ target, success: true, tick, timestamp: Date.now(), result });
      this.storage.updatePosition({ ...this.ledger.getPosition(target), tick, syncedAt: Date.now() });
      this.logger.info(
        {
          target,
          collateralSeized: result.collateralSeized.toString(),
          loanAmount: result.loanAmount.toString(),
        },
        'Liquidation executed'
      );
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.record({ target, success: false, tick, timestamp: Date.now(), error: message });
      this.logger.error(
        { target, code: isLedgerError(error) ? error.code : undefined, error: message },
        'Liquidation failed'
      );
      return false;
    }
  }

  private record(record: LiquidationRecord): void {
    this.storage.recordLiquidation(record);
  }
}
