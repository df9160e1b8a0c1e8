export type AssetKind = "collateral" | "base";

export type AccountTable = AssetKind | "loan";

export const ASSET_KINDS: readonly AssetKind[] = ["collateral", "base"];
export const ACCOUNT_TABLES: readonly AccountTable[] = ["collateral", "base", "loan"];

/**
 * Interest-bearing balance held by one participant in one table
 */
export type Account = {
    deposit: bigint,
    interest: bigint,
    // 0n = never touched
    lastAccrualTick: bigint
}

/**
 * Identity and attached base-asset value of a ledger call
 */
export type CallContext = {
    caller: string,
    value?: bigint
}

export type AccountSnapshot = Record<AccountTable, Account>;

export type PositionView = {
    participant: string,
    collateral: bigint,
    base: bigint,
    loan: bigint,
    collateralRatio: bigint,
    maxAdditionalLoan: bigint,
    liquidatable: boolean
}

export type LiquidationResult = {
    liquidator: string,
    target: string,
    collateralSeized: bigint,
    loanAmount: bigint,
    valuePaid: bigint
}

export type DepositEvent = {
    type: "Deposit",
    participant: string,
    assetKind: AssetKind,
    amount: bigint
}

export type WithdrawEvent = {
    type: "Withdraw",
    participant: string,
    assetKind: AssetKind,
    amount: bigint
}

export type BorrowEvent = {
    type: "Borrow",
    participant: string,
    amount: bigint,
    collateralRatio: bigint
}

export type RepayEvent = {
    type: "Repay",
    participant: string,
    remainingPrincipal: bigint
}

export type LiquidateEvent = { type: "Liquidate" } & LiquidationResult;

export type LedgerEvent =
    | DepositEvent
    | WithdrawEvent
    | BorrowEvent
    | RepayEvent
    | LiquidateEvent;

export type LedgerEventListener = (event: LedgerEvent) => void;
