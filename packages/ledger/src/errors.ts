export const ERROR_CODES = {
    UNSUPPORTED_ASSET: "UnsupportedAsset",
    TRANSFER_REJECTED: "TransferRejected",
    INVALID_ATTACHED_VALUE: "InvalidAttachedValue",
    NO_BALANCE: "NoBalance",
    INSUFFICIENT_BALANCE: "InsufficientBalance",
    NO_COLLATERAL: "NoCollateral",
    COLLATERAL_RATIO_VIOLATION: "CollateralRatioViolation",
    INSUFFICIENT_PAYMENT: "InsufficientPayment",
    NOTHING_TO_REPAY: "NothingToRepay",
    SELF_LIQUIDATION: "SelfLiquidation",
    HEALTHY_POSITION: "HealthyPosition",
    INSUFFICIENT_COLLATERAL: "InsufficientCollateral",
    INVALID_AMOUNT: "InvalidAmount",
    INVALID_PARTICIPANT: "InvalidParticipant",
    ORACLE_FAILURE: "OracleFailure",
    ARITHMETIC_OVERFLOW: "ArithmeticOverflow",
} as const;

export type LedgerErrorKey = keyof typeof ERROR_CODES;
export type LedgerErrorCode = (typeof ERROR_CODES)[LedgerErrorKey];

/**
 * Precondition or transfer failure raised by a ledger operation.
 * Thrown before anything is committed, so the tables are untouched.
 */
export class LedgerError extends Error {
    readonly code: LedgerErrorCode;
    readonly details?: unknown;

    constructor(code: LedgerErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = "LedgerError";
        this.code = code;
        this.details = details;
    }
}

export function createError(
    key: LedgerErrorKey,
    message: string,
    details?: unknown
): LedgerError {
    return new LedgerError(ERROR_CODES[key], message, details);
}

export function isLedgerError(error: unknown): error is LedgerError {
    return error instanceof LedgerError;
}
