import {
    INFINITE_RATIO,
    MIN_COLLATERAL_PERCENT,
    RATE_BASE,
    RATIO_BASE,
} from "../constants";
import { checked, checkedMul } from "./index";

/**
 * Value of a collateral amount in base-asset units, truncated
 * @param collateral - collateral amount in collateral units
 * @param rate - base units per collateral unit (in RATE_BASE)
 */
export function collateralValue(collateral: bigint, rate: bigint): bigint {
    return checkedMul(collateral, rate) / RATE_BASE;
}

/**
 * Collateral units bought by a base-asset value at the given rate, truncated
 * @param value - base-asset amount
 * @param rate - base units per collateral unit (in RATE_BASE)
 */
export function collateralForValue(value: bigint, rate: bigint): bigint {
    return checkedMul(value, RATE_BASE) / rate;
}

/**
 * Calculates the collateral ratio in basis points (15000 = 150.00%)
 * @notice 0 without collateral, INFINITE_RATIO with collateral and no loan
 *
 * @param collateral - collateral balance including interest
 * @param loan - loan balance including interest
 * @param rate - base units per collateral unit (in RATE_BASE)
 */
export function calculateCollateralRatio(
    collateral: bigint,
    loan: bigint,
    rate: bigint
): bigint {
    if (collateral === 0n) return 0n;
    if (loan === 0n) return INFINITE_RATIO;
    return checkedMul(collateral, rate, RATIO_BASE) / checkedMul(loan, RATE_BASE);
}

/**
 * Largest total loan the collateral supports at the minimum ratio.
 * One division keeps floor(collateral * rate * 100 / 150) exact.
 */
export function calculateMaxTotalLoan(collateral: bigint, rate: bigint): bigint {
    return checkedMul(collateral, rate, 100n) / checkedMul(MIN_COLLATERAL_PERCENT, RATE_BASE);
}

/**
 * Headroom left for borrowing; negative when the position is already below the minimum
 */
export function calculateMaxLoan(collateral: bigint, loan: bigint, rate: bigint): bigint {
    return calculateMaxTotalLoan(collateral, rate) - checked(loan, "loan");
}

/**
 * Convert a decimal exchange rate (e.g. 2.5) to RATE_BASE fixed point.
 * Numbers go through their shortest decimal form; exponent notation is rejected.
 */
export function rateFromDecimal(rate: number | string): bigint {
    const text = typeof rate === "number" ? String(rate) : rate.trim();
    const match = /^(\d+)(?:\.(\d+))?$/.exec(text);
    if (!match) {
        throw new Error(`Invalid rate: ${rate}`);
    }
    const whole = BigInt(match[1] ?? "0");
    const fraction = (match[2] ?? "").slice(0, 18).padEnd(18, "0");
    return whole * RATE_BASE + BigInt(fraction);
}

/**
 * Convert a RATE_BASE fixed point rate to a decimal number
 */
export function rateToDecimal(rate: bigint): number {
    return Number(rate) / Number(RATE_BASE);
}
