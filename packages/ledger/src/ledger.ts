import type { Logger } from "pino";
import { accrue, availableBalance, credit, deplete, touch } from "./accrual";
import type { CustodyAdapter, NativeVault, PriceOracle, TickSource } from "./adapters";
import {
    DEFAULT_COLLATERAL_ASSET,
    DEPOSIT_RATE_BPS,
    LOAN_RATE_BPS,
    MIN_COLLATERAL_RATIO,
} from "./constants";
import { createError, isLedgerError } from "./errors";
import { AccountStore } from "./store";
import {
    ASSET_KINDS,
    type AccountTable,
    type AssetKind,
    type CallContext,
    type LedgerEvent,
    type LedgerEventListener,
    type LiquidationResult,
    type PositionView,
} from "./types";
import { checkedAdd, requireAmount, requireParticipant } from "./utils";
import {
    calculateCollateralRatio,
    calculateMaxLoan,
    collateralForValue,
    collateralValue,
} from "./utils/math";

export interface LedgerOptions {
    oracle: PriceOracle;
    custody: CustodyAdapter;
    vault: NativeVault;
    clock: TickSource;
    logger: Logger;
    collateralAssetId?: string;
    store?: AccountStore;
}

const TABLE_RATES: Record<AccountTable, bigint> = {
    collateral: DEPOSIT_RATE_BPS,
    base: DEPOSIT_RATE_BPS,
    loan: LOAN_RATE_BPS,
};

export function isAssetKind(kind: string): kind is AssetKind {
    return ASSET_KINDS.some((known) => known === kind);
}

export function requireAssetKind(kind: string): AssetKind {
    if (!isAssetKind(kind)) {
        throw createError("UNSUPPORTED_ASSET", `Unsupported asset kind: ${kind}`, {
            supported: ASSET_KINDS,
        });
    }
    return kind;
}

/**
 * Collateralized lending ledger: collateral deposits, base-asset deposits and loans
 * per participant, with simple per-tick interest and a 150% minimum collateral ratio.
 *
 * Every operation stages its writes on copies, performs its one external transfer,
 * then commits all writes at once and emits its event. A thrown error leaves the
 * tables as they were.
 */
export class Ledger {
    private store: AccountStore;
    private oracle: PriceOracle;
    private custody: CustodyAdapter;
    private vault: NativeVault;
    private clock: TickSource;
    private logger: Logger;
    private collateralAssetId: string;
    private listeners: Set<LedgerEventListener> = new Set();

    constructor(options: LedgerOptions) {
        this.store = options.store ?? new AccountStore();
        this.oracle = options.oracle;
        this.custody = options.custody;
        this.vault = options.vault;
        this.clock = options.clock;
        this.logger = options.logger;
        this.collateralAssetId = options.collateralAssetId ?? DEFAULT_COLLATERAL_ASSET;
    }

    /**
     * Subscribe to ledger notifications
     * @return unsubscribe function
     */
    onEvent(listener: LedgerEventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    getCollateralAssetId(): string {
        return this.collateralAssetId;
    }

    /**
     * Deposit collateral (pulled through custody) or base asset (attached to the call)
     *
     * @param ctx - caller and attached value
     * @param kind - "collateral" or "base"; anything else is UnsupportedAsset
     * @param amount - amount to deposit; 0 only consolidates interest
     */
    deposit(ctx: CallContext, kind: string, amount: bigint): void {
        return this.run("deposit", ctx, () => {
            const caller = requireParticipant(ctx.caller);
            const assetKind = requireAssetKind(kind);
            requireAmount(amount);
            const value = this.attachedValue(ctx);

            const expectedValue = assetKind === "base" ? amount : 0n;
            if (value !== expectedValue) {
                throw createError(
                    "INVALID_ATTACHED_VALUE",
                    `Attached value must equal ${expectedValue} for a ${assetKind} deposit`,
                    { attached: value.toString(), expected: expectedValue.toString() }
                );
            }

            const tick = this.clock.currentTick();
            const account = credit(this.touched(assetKind, caller, tick), amount);

            if (assetKind === "collateral") {
                this.pullCollateral(caller, amount);
            } else {
                this.vault.receive(caller, value);
            }

            this.store.commit([{ table: assetKind, participant: caller, account }]);
            this.logger.debug(
                { participant: caller, assetKind, amount: amount.toString(), tick: tick.toString() },
                "Deposit committed"
            );
            this.emit({ type: "Deposit", participant: caller, assetKind, amount });
        });
    }

    /**
     * Withdraw from a deposit, interest first. An amount of 0 withdraws everything;
     * naming the full available balance explicitly is rejected.
     *
     * @return available balance after the withdrawal
     */
    withdraw(ctx: CallContext, kind: string, amount: bigint): bigint {
        return this.run("withdraw", ctx, () => {
            const caller = requireParticipant(ctx.caller);
            const assetKind = requireAssetKind(kind);
            requireAmount(amount);
            this.requireNoValue(ctx);

            const tick = this.clock.currentTick();
            const account = this.touched(assetKind, caller, tick);
            const available = availableBalance(account);

            if (available === 0n) {
                throw createError("NO_BALANCE", `No ${assetKind} balance to withdraw`);
            }
            if (amount !== 0n && amount >= available) {
                throw createError(
                    "INSUFFICIENT_BALANCE",
                    "Withdrawal must be below the available balance; use 0 to withdraw everything",
                    { amount: amount.toString(), available: available.toString() }
                );
            }

            const withdrawal = amount === 0n ? available : amount;
            const updated = deplete(account, withdrawal);

            if (assetKind === "collateral") {
                this.transferOut("custody", () => this.custody.pushTo(caller, withdrawal));
            } else {
                this.transferOut("vault", () => this.vault.send(caller, withdrawal));
            }

            this.store.commit([{ table: assetKind, participant: caller, account: updated }]);
            this.logger.debug(
                { participant: caller, assetKind, amount: withdrawal.toString() },
                "Withdrawal committed"
            );
            this.emit({ type: "Withdraw", participant: caller, assetKind, amount: withdrawal });

            return availableBalance(updated);
        });
    }

    /**
     * Borrow base asset against collateral. An amount of 0 borrows the maximum
     * the position allows at the minimum collateral ratio.
     *
     * @return collateral ratio after the loan (basis points)
     */
    borrow(ctx: CallContext, amount: bigint): bigint {
        return this.run("borrow", ctx, () => {
            const caller = requireParticipant(ctx.caller);
            requireAmount(amount);
            this.requireNoValue(ctx);

            const rate = this.currentRate();
            const tick = this.clock.currentTick();
            const collateral = this.touched("collateral", caller, tick);
            const loan = this.touched("loan", caller, tick);

            const collateralBalance = availableBalance(collateral);
            if (collateralBalance === 0n) {
                throw createError("NO_COLLATERAL", "Deposit collateral before borrowing");
            }

            const loanBalance = availableBalance(loan);
            const maxLoan = calculateMaxLoan(collateralBalance, loanBalance, rate);
            if (maxLoan < 0n || (amount !== 0n && amount > maxLoan)) {
                throw createError(
                    "COLLATERAL_RATIO_VIOLATION",
                    "Loan would take the position below the minimum collateral ratio",
                    { amount: amount.toString(), maxLoan: maxLoan.toString() }
                );
            }

            const borrowed = amount === 0n ? maxLoan : amount;
            const updatedLoan = credit(loan, borrowed);
            const ratio = calculateCollateralRatio(collateralBalance, availableBalance(updatedLoan), rate);

            this.transferOut("vault", () => this.vault.send(caller, borrowed));

            this.store.commit([
                { table: "collateral", participant: caller, account: collateral },
                { table: "loan", participant: caller, account: updatedLoan },
            ]);
            this.logger.debug(
                { participant: caller, amount: borrowed.toString(), collateralRatio: ratio.toString() },
                "Borrow committed"
            );
            this.emit({ type: "Borrow", participant: caller, amount: borrowed, collateralRatio: ratio });

            return ratio;
        });
    }

    /**
     * Repay a loan with attached base asset, interest first. The attached value must
     * equal `amount`; paying more than is owed clears the loan without a refund.
     *
     * @return remaining principal
     */
    repay(ctx: CallContext, amount: bigint): bigint {
        return this.run("repay", ctx, () => {
            const caller = requireParticipant(ctx.caller);
            requireAmount(amount);
            const value = this.attachedValue(ctx);

            if (amount > value) {
                throw createError("INSUFFICIENT_PAYMENT", "Attached value is less than the repay amount", {
                    amount: amount.toString(),
                    attached: value.toString(),
                });
            }
            if (value > amount) {
                throw createError("INVALID_ATTACHED_VALUE", "Attached value exceeds the repay amount", {
                    amount: amount.toString(),
                    attached: value.toString(),
                });
            }

            const tick = this.clock.currentTick();
            const loan = this.touched("loan", caller, tick);
            const outstanding = availableBalance(loan);
            if (outstanding === 0n) {
                throw createError("NOTHING_TO_REPAY", "No outstanding loan");
            }

            const updated = outstanding < amount
                ? { deposit: 0n, interest: 0n, lastAccrualTick: loan.lastAccrualTick }
                : deplete(loan, amount);

            this.vault.receive(caller, value);

            this.store.commit([{ table: "loan", participant: caller, account: updated }]);
            this.logger.debug(
                { participant: caller, amount: amount.toString(), remainingPrincipal: updated.deposit.toString() },
                "Repay committed"
            );
            this.emit({ type: "Repay", participant: caller, remainingPrincipal: updated.deposit });

            return updated.deposit;
        });
    }

    /**
     * Close an undercollateralized position in full. The liquidator attaches at least the
     * outstanding loan, receives collateral worth the attached value and the target's loan
     * is cleared.
     *
     * @param ctx - liquidator and attached value
     * @param account - participant being liquidated
     */
    liquidate(ctx: CallContext, account: string): LiquidationResult {
        return this.run("liquidate", ctx, () => {
            const liquidator = requireParticipant(ctx.caller);
            const target = requireParticipant(account);
            if (liquidator === target) {
                throw createError("SELF_LIQUIDATION", "A position cannot be liquidated by its owner");
            }
            const value = this.attachedValue(ctx);

            const rate = this.currentRate();
            const tick = this.clock.currentTick();
            const targetCollateral = this.touched("collateral", target, tick);
            const targetLoan = this.touched("loan", target, tick);
            const collateralBalance = availableBalance(targetCollateral);
            const loanBalance = availableBalance(targetLoan);

            const ratio = calculateCollateralRatio(collateralBalance, loanBalance, rate);
            if (loanBalance === 0n || ratio >= MIN_COLLATERAL_RATIO) {
                throw createError("HEALTHY_POSITION", `Position of ${target} is not liquidatable`, {
                    collateralRatio: ratio.toString(),
                });
            }
            if (value < loanBalance) {
                throw createError("INSUFFICIENT_PAYMENT", "Attached value does not cover the outstanding loan", {
                    attached: value.toString(),
                    loan: loanBalance.toString(),
                });
            }
            if (collateralValue(collateralBalance, rate) < loanBalance) {
                throw createError("INSUFFICIENT_COLLATERAL", "Collateral is worth less than the outstanding loan", {
                    collateral: collateralBalance.toString(),
                    loan: loanBalance.toString(),
                });
            }

            const collateralSeized = collateralForValue(value, rate);
            if (collateralSeized > collateralBalance) {
                throw createError("INSUFFICIENT_COLLATERAL", "Attached value buys more collateral than the position holds", {
                    collateral: collateralBalance.toString(),
                    seized: collateralSeized.toString(),
                });
            }

            const updatedTargetCollateral = deplete(targetCollateral, collateralSeized);
            const liquidatorCollateral = credit(this.touched("collateral", liquidator, tick), collateralSeized);
            const clearedLoan = { deposit: 0n, interest: 0n, lastAccrualTick: targetLoan.lastAccrualTick };

            this.vault.receive(liquidator, value);

            this.store.commit([
                { table: "collateral", participant: target, account: updatedTargetCollateral },
                { table: "collateral", participant: liquidator, account: liquidatorCollateral },
                { table: "loan", participant: target, account: clearedLoan },
            ]);

            const result: LiquidationResult = {
                liquidator,
                target,
                collateralSeized,
                loanAmount: loanBalance,
                valuePaid: value,
            };
            this.logger.debug(
                {
                    liquidator,
                    target,
                    collateralSeized: collateralSeized.toString(),
                    loanAmount: loanBalance.toString(),
                    valuePaid: value.toString(),
                },
                "Liquidation committed"
            );
            this.emit({ type: "Liquidate", ...result });

            return result;
        });
    }

    /**
     * Collateral ratio of a participant in basis points, including pending interest.
     * 0 without collateral; INFINITE_RATIO with collateral and no loan.
     */
    getCollateralRatio(account: string): bigint {
        const participant = requireParticipant(account);
        const rate = this.currentRate();
        const tick = this.clock.currentTick();
        return calculateCollateralRatio(
            this.preview("collateral", participant, tick),
            this.preview("loan", participant, tick),
            rate
        );
    }

    /**
     * Caller's deposit balance including pending interest, without committing it
     */
    getBalance(ctx: CallContext, kind: string): bigint {
        const caller = requireParticipant(ctx.caller);
        const assetKind = requireAssetKind(kind);
        return this.preview(assetKind, caller, this.clock.currentTick());
    }

    /**
     * Outstanding loan including pending interest, without committing it
     */
    getLoanBalance(participant: string): bigint {
        return this.preview("loan", requireParticipant(participant), this.clock.currentTick());
    }

    /**
     * Full view of a participant's position at the current tick and rate
     */
    getPosition(participant: string): PositionView {
        requireParticipant(participant);
        const rate = this.currentRate();
        const tick = this.clock.currentTick();
        const collateral = this.preview("collateral", participant, tick);
        const loan = this.preview("loan", participant, tick);
        const collateralRatio = calculateCollateralRatio(collateral, loan, rate);
        const maxLoan = calculateMaxLoan(collateral, loan, rate);

        return {
            participant,
            collateral,
            base: this.preview("base", participant, tick),
            loan,
            collateralRatio,
            maxAdditionalLoan: maxLoan > 0n ? maxLoan : 0n,
            liquidatable: loan > 0n && collateralRatio < MIN_COLLATERAL_RATIO,
        };
    }

    /**
     * Every participant with a record in any table
     */
    getParticipants(): string[] {
        const participants = new Set<string>();
        for (const table of ["collateral", "base", "loan"] as const) {
            for (const participant of this.store.participants(table)) {
                participants.add(participant);
            }
        }
        return Array.from(participants);
    }

    getStats() {
        return {
            tick: this.clock.currentTick(),
            vaultBalance: this.vault.balance(),
            tables: this.store.getStats(),
        };
    }

    private touched(table: AccountTable, participant: string, tick: bigint) {
        return touch(this.store.get(table, participant), TABLE_RATES[table], tick);
    }

    private preview(table: AccountTable, participant: string, tick: bigint): bigint {
        const account = this.store.get(table, participant);
        return checkedAdd(account.deposit, accrue(account, TABLE_RATES[table], tick));
    }

    private currentRate(): bigint {
        let rate: bigint;
        try {
            rate = this.oracle.getRate(this.collateralAssetId);
        } catch (error) {
            throw createError("ORACLE_FAILURE", `Price oracle failed for ${this.collateralAssetId}`, {
                cause: error instanceof Error ? error.message : String(error),
            });
        }
        if (rate <= 0n) {
            throw createError("ORACLE_FAILURE", `Price oracle returned a non-positive rate for ${this.collateralAssetId}`, {
                rate: rate.toString(),
            });
        }
        return rate;
    }

    private attachedValue(ctx: CallContext): bigint {
        const value = ctx.value ?? 0n;
        if (value < 0n) {
            throw createError("INVALID_ATTACHED_VALUE", "Attached value must not be negative");
        }
        return value;
    }

    private requireNoValue(ctx: CallContext): void {
        if (this.attachedValue(ctx) !== 0n) {
            throw createError("INVALID_ATTACHED_VALUE", "This operation does not accept attached value");
        }
    }

    private pullCollateral(participant: string, amount: bigint): void {
        let accepted: boolean;
        try {
            accepted = this.custody.pullFrom(participant, amount);
        } catch (error) {
            throw createError("TRANSFER_REJECTED", "Collateral transfer into custody failed", {
                cause: error instanceof Error ? error.message : String(error),
            });
        }
        if (!accepted) {
            throw createError("TRANSFER_REJECTED", "Collateral transfer into custody was refused", {
                participant,
                amount: amount.toString(),
            });
        }
    }

    private transferOut(source: "custody" | "vault", transfer: () => void): void {
        try {
            transfer();
        } catch (error) {
            throw createError("TRANSFER_REJECTED", `Transfer out of ${source} failed`, {
                cause: error instanceof Error ? error.message : String(error),
            });
        }
    }

    private emit(event: LedgerEvent): void {
        for (const listener of this.listeners) {
            try {
                listener(event);
            } catch (error) {
                this.logger.error({ error, event: event.type }, "Ledger event listener failed");
            }
        }
    }

    private run<T>(operation: string, ctx: CallContext, execute: () => T): T {
        try {
            return execute();
        } catch (error) {
            if (isLedgerError(error)) {
                this.logger.debug(
                    { operation, caller: ctx.caller, code: error.code, details: error.details },
                    "Ledger operation rejected"
                );
            } else {
                this.logger.error({ error, operation, caller: ctx.caller }, "Ledger operation failed");
            }
            throw error;
        }
    }
}
