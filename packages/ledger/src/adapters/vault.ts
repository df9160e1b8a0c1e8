/**
 * The ledger's holdings of the base asset. Inbound value arrives attached
 * to a call; outbound value is sent straight to a participant.
 */
export interface NativeVault {
    receive(from: string, amount: bigint): void;
    /**
     * @throws when the vault cannot cover the amount
     */
    send(to: string, amount: bigint): void;
    balance(): bigint;
}

export class InMemoryVault implements NativeVault {
    private holdings: bigint;
    private payouts: Map<string, bigint> = new Map();

    constructor(initialBalance: bigint = 0n) {
        this.holdings = initialBalance;
    }

    receive(_from: string, amount: bigint): void {
        this.holdings += amount;
    }

    send(to: string, amount: bigint): void {
        if (amount < 0n || this.holdings < amount) {
            throw new Error(`Vault holds ${this.holdings}, cannot send ${amount}`);
        }
        this.holdings -= amount;
        this.payouts.set(to, this.paidTo(to) + amount);
    }

    balance(): bigint {
        return this.holdings;
    }

    /**
     * Total base asset sent to a participant
     */
    paidTo(participant: string): bigint {
        return this.payouts.get(participant) ?? 0n;
    }
}
