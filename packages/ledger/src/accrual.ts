import { BPS_BASE } from "./constants";
import { createError } from "./errors";
import type { Account } from "./types";
import { checked, checkedAdd, checkedMul } from "./utils";

export const ZERO_ACCOUNT: Readonly<Account> = Object.freeze({
    deposit: 0n,
    interest: 0n,
    lastAccrualTick: 0n,
});

export function zeroAccount(): Account {
    return { ...ZERO_ACCOUNT };
}

/**
 * Interest an account would hold at `currentTick`, without committing it.
 * Simple interest: rateBps / 10000 of the principal per elapsed tick, truncated.
 *
 * @param account - account to preview
 * @param rateBps - basis points of principal per tick (3 = 3% per 100 ticks)
 * @param currentTick - tick to accrue up to
 * @return interest - consolidated interest plus the pending accrual
 */
export function accrue(account: Account, rateBps: bigint, currentTick: bigint): bigint {
    const { deposit, interest, lastAccrualTick } = account;
    if (lastAccrualTick === 0n || currentTick <= lastAccrualTick) {
        return interest;
    }
    const elapsed = currentTick - lastAccrualTick;
    return checkedAdd(interest, checkedMul(deposit, elapsed, rateBps) / BPS_BASE);
}

/**
 * Bring an account's interest current and stamp the tick.
 * A never-touched account is only stamped; nothing accrues from tick zero.
 */
export function touch(account: Account, rateBps: bigint, currentTick: bigint): Account {
    if (account.lastAccrualTick === 0n) {
        return { ...account, lastAccrualTick: currentTick };
    }
    return {
        deposit: account.deposit,
        interest: accrue(account, rateBps, currentTick),
        lastAccrualTick: currentTick > account.lastAccrualTick ? currentTick : account.lastAccrualTick,
    };
}

export function availableBalance(account: Account): bigint {
    return checkedAdd(account.deposit, account.interest);
}

/**
 * Take `amount` out of an account, draining interest before principal
 */
export function deplete(account: Account, amount: bigint): Account {
    if (amount > availableBalance(account)) {
        throw createError("INSUFFICIENT_BALANCE", "Amount exceeds available balance", {
            amount: amount.toString(),
            available: availableBalance(account).toString(),
        });
    }
    if (amount <= account.interest) {
        return { ...account, interest: account.interest - amount };
    }
    return {
        ...account,
        deposit: checked(account.deposit - (amount - account.interest), "deposit"),
        interest: 0n,
    };
}

export function credit(account: Account, amount: bigint): Account {
    return { ...account, deposit: checkedAdd(account.deposit, amount) };
}
