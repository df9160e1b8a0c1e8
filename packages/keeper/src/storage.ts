import type { LiquidationRecord, PositionSnapshot } from './utils';
import { DEFAULT_MAX_LIQUIDATION_HISTORY } from './utils';

/**
 * In-memory storage for synced positions and liquidation history
 */
export class PositionStorage {
  private positions: Map<string, PositionSnapshot> = new Map();
  private liquidations: LiquidationRecord[] = [];
  private maxHistory: number;

  constructor(maxHistory: number = DEFAULT_MAX_LIQUIDATION_HISTORY) {
    this.maxHistory = maxHistory;
  }

  /**
   * Update or create the snapshot for a participant
   */
  updatePosition(snapshot: PositionSnapshot): void {
    this.positions.set(snapshot.participant, snapshot);
  }

  /**
   * Get snapshot for a participant
   */
  getPosition(participant: string): PositionSnapshot | undefined {
    return this.positions.get(participant);
  }

  /**
   * Get all snapshots
   */
  getAllPositions(): PositionSnapshot[] {
    return Array.from(this.positions.values());
  }

  /**
   * Snapshots below the minimum collateral ratio, lowest ratio first
   */
  getLiquidatablePositions(): PositionSnapshot[] {
    return this.getAllPositions()
      .filter((position) => position.liquidatable)
      .sort((a, b) => (a.collateralRatio < b.collateralRatio ? -1 : a.collateralRatio > b.collateralRatio ? 1 : 0));
  }

  removePosition(participant: string): boolean {
    return this.positions.delete(participant);
  }

  /**
   * Record a liquidation attempt, newest first
   */
  recordLiquidation(record: LiquidationRecord): void {
    this.liquidations.unshift(record);
    if (this.liquidations.length > this.maxHistory) {
      this.liquidations.length = this.maxHistory;
    }
  }

  /**
   * Get liquidation history (with pagination)
   */
  getLiquidations(limit: number = 100, offset: number = 0): {
    liquidations: LiquidationRecord[];
    total: number;
  } {
    return {
      liquidations: this.liquidations.slice(offset, offset + limit),
      total: this.liquidations.length,
    };
  }

  /**
   * Get statistics
   */
  getStats() {
    const successful = this.liquidations.filter((record) => record.success).length;
    return {
      trackedPositions: this.positions.size,
      liquidatablePositions: this.getLiquidatablePositions().length,
      liquidationAttempts: this.liquidations.length,
      successfulLiquidations: successful,
    };
  }
}
