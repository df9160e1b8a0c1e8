import { zeroAccount } from "./accrual";
import type { Account, AccountSnapshot, AccountTable } from "./types";
import { checked } from "./utils";

export type AccountWrite = {
    table: AccountTable,
    participant: string,
    account: Account
}

export type TableStats = {
    records: number,
    nonZero: number
}

function isZero(account: Account): boolean {
    return account.deposit === 0n && account.interest === 0n;
}

function copy(account: Account): Account {
    return {
        deposit: account.deposit,
        interest: account.interest,
        lastAccrualTick: account.lastAccrualTick,
    };
}

/**
 * In-memory account tables (collateral deposits, base deposits, loans)
 * keyed by participant. Records never leave the store by reference.
 */
export class AccountStore {
    private tables: Record<AccountTable, Map<string, Account>> = {
        collateral: new Map(),
        base: new Map(),
        loan: new Map(),
    };

    /**
     * Get a copy of a participant's record, or a zero record if none exists
     */
    get(table: AccountTable, participant: string): Account {
        const account = this.tables[table].get(participant);
        return account ? copy(account) : zeroAccount();
    }

    /**
     * Store a copy of a record
     */
    put(table: AccountTable, participant: string, account: Account): void {
        this.commit([{ table, participant, account }]);
    }

    /**
     * Apply a batch of writes. Every record is validated before any is stored.
     */
    commit(writes: AccountWrite[]): void {
        for (const { account } of writes) {
            checked(account.deposit, "deposit");
            checked(account.interest, "interest");
            checked(account.lastAccrualTick, "lastAccrualTick");
        }
        for (const { table, participant, account } of writes) {
            this.tables[table].set(participant, copy(account));
        }
    }

    has(table: AccountTable, participant: string): boolean {
        return this.tables[table].has(participant);
    }

    /**
     * Participants with a record in the table
     */
    participants(table: AccountTable): string[] {
        return Array.from(this.tables[table].keys());
    }

    /**
     * Copies of all three records for a participant
     */
    snapshot(participant: string): AccountSnapshot {
        return {
            collateral: this.get("collateral", participant),
            base: this.get("base", participant),
            loan: this.get("loan", participant),
        };
    }

    /**
     * Get statistics
     */
    getStats(): Record<AccountTable, TableStats> {
        return {
            collateral: this.tableStats("collateral"),
            base: this.tableStats("base"),
            loan: this.tableStats("loan"),
        };
    }

    private tableStats(table: AccountTable): TableStats {
        const accounts = Array.from(this.tables[table].values());
        return {
            records: accounts.length,
            nonZero: accounts.filter((account) => !isZero(account)).length,
        };
    }
}
