/**
 * Moves collateral tokens between participants and ledger custody
 */
export interface CustodyAdapter {
    /**
     * Pull `amount` from the participant into custody
     * @return false if the transfer was refused
     */
    pullFrom(participant: string, amount: bigint): boolean;
    /**
     * Release `amount` from custody to the participant
     * @throws when custody cannot cover the amount
     */
    pushTo(participant: string, amount: bigint): void;
}

/**
 * In-memory collateral token: wallet balances plus the ledger's custody balance
 */
export class InMemoryCustody implements CustodyAdapter {
    private balances: Map<string, bigint> = new Map();
    private custody: bigint;

    /**
     * @param initialReserve - tokens custody holds before any deposit, covering accrued interest on release
     */
    constructor(initialReserve: bigint = 0n) {
        this.custody = initialReserve;
    }

    mint(participant: string, amount: bigint): void {
        this.balances.set(participant, this.balanceOf(participant) + amount);
    }

    balanceOf(participant: string): bigint {
        return this.balances.get(participant) ?? 0n;
    }

    custodyBalance(): bigint {
        return this.custody;
    }

    pullFrom(participant: string, amount: bigint): boolean {
        const balance = this.balanceOf(participant);
        if (amount < 0n || balance < amount) {
            return false;
        }
        this.balances.set(participant, balance - amount);
        this.custody += amount;
        return true;
    }

    pushTo(participant: string, amount: bigint): void {
        if (amount < 0n || this.custody < amount) {
            throw new Error(`Custody holds ${this.custody}, cannot release ${amount}`);
        }
        this.custody -= amount;
        this.balances.set(participant, this.balanceOf(participant) + amount);
    }
}
