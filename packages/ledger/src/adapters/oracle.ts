import type { Logger } from "pino";
import { rateToDecimal } from "../utils/math";

/**
 * Source of the collateral exchange rate: base-asset units per collateral
 * unit, scaled by RATE_BASE. Reads only.
 */
export interface PriceOracle {
    getRate(collateralAssetId: string): bigint;
}

/**
 * Settable in-memory price feed for local runs and tests
 */
export class MockPriceFeed implements PriceOracle {
    private logger: Logger;
    private rates: Map<string, { rate: bigint; updatedAt: number }> = new Map();

    constructor(logger: Logger) {
        this.logger = logger;
    }

    /**
     * Get the current rate for an asset
     * @throws if no rate has been set
     */
    getRate(collateralAssetId: string): bigint {
        const entry = this.rates.get(collateralAssetId);
        if (!entry) {
            throw new Error(`No rate set for asset ${collateralAssetId}`);
        }
        return entry.rate;
    }

    /**
     * Set the rate for an asset (scaled by RATE_BASE)
     */
    setRate(collateralAssetId: string, rate: bigint): void {
        if (rate <= 0n) {
            throw new Error(`Rate for ${collateralAssetId} must be positive`);
        }
        this.rates.set(collateralAssetId, { rate, updatedAt: Date.now() });
        this.logger.info(
            { asset: collateralAssetId, rate: rateToDecimal(rate) },
            "Price feed rate updated"
        );
    }

    hasRate(collateralAssetId: string): boolean {
        return this.rates.has(collateralAssetId);
    }

    getLastUpdateTime(collateralAssetId: string): number | undefined {
        return this.rates.get(collateralAssetId)?.updatedAt;
    }
}
