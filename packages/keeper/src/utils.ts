import {
  ERROR_CODES,
  formatRatio,
  math,
  type LedgerError,
  type LedgerErrorCode,
  type LiquidationResult,
  type PositionView,
} from '@lendbook/ledger';

// ==================== Defaults ====================

export const DEFAULT_KEEPER_PORT = 9100;
export const DEFAULT_TICK_INTERVAL = 1000; // 1 tick per second
export const DEFAULT_SYNC_INTERVAL = 5000; // 5 seconds
export const DEFAULT_INITIAL_RATE = '2.0';
export const DEFAULT_KEEPER_ADDRESS = 'keeper';
export const DEFAULT_KEEPER_BUDGET = 1_000_000n;
export const DEFAULT_VAULT_LIQUIDITY = 1_000_000n;
export const DEFAULT_CUSTODY_LIQUIDITY = 1_000_000n;
export const DEFAULT_MAX_LIQUIDATION_HISTORY = 500;

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  INTERNAL_SERVER_ERROR: 500,
  BAD_GATEWAY: 502,
} as const;

export type ErrorStatus =
  | typeof HTTP_STATUS.BAD_REQUEST
  | typeof HTTP_STATUS.CONFLICT
  | typeof HTTP_STATUS.BAD_GATEWAY;

export const LEDGER_ERROR_STATUS: Record<LedgerErrorCode, ErrorStatus> = {
  [ERROR_CODES.UNSUPPORTED_ASSET]: HTTP_STATUS.BAD_REQUEST,
  [ERROR_CODES.INVALID_ATTACHED_VALUE]: HTTP_STATUS.BAD_REQUEST,
  [ERROR_CODES.INVALID_AMOUNT]: HTTP_STATUS.BAD_REQUEST,
  [ERROR_CODES.INVALID_PARTICIPANT]: HTTP_STATUS.BAD_REQUEST,
  [ERROR_CODES.SELF_LIQUIDATION]: HTTP_STATUS.BAD_REQUEST,
  [ERROR_CODES.ARITHMETIC_OVERFLOW]: HTTP_STATUS.BAD_REQUEST,
  [ERROR_CODES.NO_BALANCE]: HTTP_STATUS.CONFLICT,
  [ERROR_CODES.INSUFFICIENT_BALANCE]: HTTP_STATUS.CONFLICT,
  [ERROR_CODES.NO_COLLATERAL]: HTTP_STATUS.CONFLICT,
  [ERROR_CODES.COLLATERAL_RATIO_VIOLATION]: HTTP_STATUS.CONFLICT,
  [ERROR_CODES.INSUFFICIENT_PAYMENT]: HTTP_STATUS.CONFLICT,
  [ERROR_CODES.NOTHING_TO_REPAY]: HTTP_STATUS.CONFLICT,
  [ERROR_CODES.HEALTHY_POSITION]: HTTP_STATUS.CONFLICT,
  [ERROR_CODES.INSUFFICIENT_COLLATERAL]: HTTP_STATUS.CONFLICT,
  [ERROR_CODES.TRANSFER_REJECTED]: HTTP_STATUS.BAD_GATEWAY,
  [ERROR_CODES.ORACLE_FAILURE]: HTTP_STATUS.BAD_GATEWAY,
};

// ==================== Types ====================

export interface ServiceError {
  code: string;
  message: string;
  details?: unknown;
  timestamp: number;
}

export interface PositionSnapshot extends PositionView {
  tick: bigint;
  syncedAt: number;
}

export interface LiquidationRecord {
  target: string;
  success: boolean;
  tick: bigint;
  timestamp: number;
  result?: LiquidationResult;
  error?: string;
}

export interface SyncSummary {
  scanned: number;
  liquidatable: number;
  liquidated: number;
  failed: number;
}

// ==================== Helpers ====================

/**
 * Create a standardized service error object
 */
export function createError(
  code: string,
  message: string,
  details?: unknown
): ServiceError {
  return {
    code,
    message,
    details,
    timestamp: Date.now(),
  };
}

export function fromLedgerError(error: LedgerError): ServiceError {
  return createError(error.code, error.message, error.details);
}

/**
 * Parse a non-negative integer amount from a JSON field
 * @returns undefined when the input is not a whole non-negative number
 */
export function parseAmount(input: unknown): bigint | undefined {
  if (typeof input === 'number') {
    return Number.isSafeInteger(input) && input >= 0 ? BigInt(input) : undefined;
  }
  if (typeof input === 'string' && /^\d+$/.test(input.trim())) {
    return BigInt(input.trim());
  }
  return undefined;
}

/**
 * Parse a positive decimal rate into fixed point
 */
export function parseRate(input: unknown): bigint | undefined {
  if (typeof input !== 'number' && typeof input !== 'string') return undefined;
  if (typeof input === 'number' && (!Number.isFinite(input) || input <= 0)) return undefined;
  try {
    const rate = math.rateFromDecimal(input);
    return rate > 0n ? rate : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Validate participant identity (1-64 chars, no whitespace)
 */
export function isValidParticipant(participant: unknown): participant is string {
  return typeof participant === 'string' && /^[^\s]{1,64}$/.test(participant);
}

export function serializePosition(position: PositionView) {
  return {
    participant: position.participant,
    collateral: position.collateral.toString(),
    base: position.base.toString(),
    loan: position.loan.toString(),
    collateralRatio: position.collateralRatio.toString(),
    collateralRatioPercent: formatRatio(position.collateralRatio),
    maxAdditionalLoan: position.maxAdditionalLoan.toString(),
    liquidatable: position.liquidatable,
  };
}

export function serializeSnapshot(snapshot: PositionSnapshot) {
  return {
    ...serializePosition(snapshot),
    tick: snapshot.tick.toString(),
    syncedAt: snapshot.syncedAt,
  };
}

export function serializeLiquidation(result: LiquidationResult) {
  return {
    liquidator: result.liquidator,
    target: result.target,
    collateralSeized: result.collateralSeized.toString(),
    loanAmount: result.loanAmount.toString(),
    valuePaid: result.valuePaid.toString(),
  };
}

export function serializeLiquidationRecord(record: LiquidationRecord) {
  return {
    target: record.target,
    success: record.success,
    tick: record.tick.toString(),
    timestamp: record.timestamp,
    result: record.result ? serializeLiquidation(record.result) : undefined,
    error: record.error,
  };
}
