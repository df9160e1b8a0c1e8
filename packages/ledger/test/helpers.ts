import { expect } from "expect";
import { pino } from "pino";
import {
    AccountStore,
    DEFAULT_COLLATERAL_ASSET,
    InMemoryCustody,
    InMemoryVault,
    Ledger,
    LedgerError,
    ManualClock,
    MockPriceFeed,
    RATE_BASE,
    type LedgerErrorCode,
    type LedgerEvent,
    type NativeVault,
} from "../src";

export const logger = pino({ level: "silent" });

export type TestLedger = {
    ledger: Ledger,
    store: AccountStore,
    clock: ManualClock,
    oracle: MockPriceFeed,
    custody: InMemoryCustody,
    vault: NativeVault,
    events: LedgerEvent[]
}

/**
 * Ledger wired to in-memory adapters: rate 2 base per collateral, 1,000,000 base in the vault,
 * custody holding only what is deposited unless `custodyReserve` is given
 */
export function createTestLedger(
    opts: { rate?: bigint, vault?: NativeVault, custodyReserve?: bigint } = {}
): TestLedger {
    const store = new AccountStore();
    const clock = new ManualClock();
    const oracle = new MockPriceFeed(logger);
    oracle.setRate(DEFAULT_COLLATERAL_ASSET, opts.rate ?? 2n * RATE_BASE);
    const custody = new InMemoryCustody(opts.custodyReserve);
    const vault = opts.vault ?? new InMemoryVault(1_000_000n);
    const ledger = new Ledger({ oracle, custody, vault, clock, logger, store });
    const events: LedgerEvent[] = [];
    ledger.onEvent((event) => events.push(event));
    return { ledger, store, clock, oracle, custody, vault, events };
}

/**
 * Mint and deposit collateral for a participant
 */
export function depositCollateral(t: TestLedger, participant: string, amount: bigint): void {
    t.custody.mint(participant, amount);
    t.ledger.deposit({ caller: participant }, "collateral", amount);
}

/**
 * Vault that refuses every outbound transfer
 */
export class FrozenVault implements NativeVault {
    private holdings = 0n;

    receive(_from: string, amount: bigint): void {
        this.holdings += amount;
    }

    send(): void {
        throw new Error("vault frozen");
    }

    balance(): bigint {
        return this.holdings;
    }
}

/**
 * Assert that `fn` throws a LedgerError with the given code
 */
export function expectLedgerError(fn: () => unknown, code: LedgerErrorCode): void {
    let caught: unknown;
    try {
        fn();
    } catch (error) {
        caught = error;
    }
    expect(caught).toBeInstanceOf(LedgerError);
    expect(caught).toMatchObject({ code });
}
