export const RATE_DECIMALS = 18n;
export const RATE_BASE = 10n ** RATE_DECIMALS;

export const BPS_BASE = 10_000n;
export const RATIO_BASE = BPS_BASE;

export const DEPOSIT_RATE_BPS = 3n; // 3% per 100 ticks
export const LOAN_RATE_BPS = 5n; // 5% per 100 ticks

// 150.00%
export const MIN_COLLATERAL_RATIO = 15_000n;
export const MIN_COLLATERAL_PERCENT = 150n;

export const MAX_UINT256 = 2n ** 256n - 1n;
export const INFINITE_RATIO = MAX_UINT256;

export const DEFAULT_COLLATERAL_ASSET = "CLT";
