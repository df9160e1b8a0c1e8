import { beforeEach, describe, test } from "node:test";
import { expect } from "expect";
import { AccountStore, ERROR_CODES } from "../src";
import { expectLedgerError } from "./helpers";

describe("account store", () => {
    let store: AccountStore;

    beforeEach(() => {
        store = new AccountStore();
    });

    test("unknown participants read as zero records", () => {
        expect(store.get("loan", "alice")).toEqual({ deposit: 0n, interest: 0n, lastAccrualTick: 0n });
        expect(store.has("loan", "alice")).toBe(false);
    });

    test("reads are copies", () => {
        store.put("base", "alice", { deposit: 10n, interest: 1n, lastAccrualTick: 4n });
        const account = store.get("base", "alice");
        account.deposit = 999n;
        expect(store.get("base", "alice").deposit).toBe(10n);
    });

    test("tables are independent", () => {
        store.put("collateral", "alice", { deposit: 10n, interest: 0n, lastAccrualTick: 1n });
        expect(store.get("base", "alice").deposit).toBe(0n);
        expect(store.snapshot("alice")).toEqual({
            collateral: { deposit: 10n, interest: 0n, lastAccrualTick: 1n },
            base: { deposit: 0n, interest: 0n, lastAccrualTick: 0n },
            loan: { deposit: 0n, interest: 0n, lastAccrualTick: 0n },
        });
    });

    test("rejects negative balances", () => {
        expectLedgerError(
            () => store.put("loan", "alice", { deposit: -1n, interest: 0n, lastAccrualTick: 1n }),
            ERROR_CODES.ARITHMETIC_OVERFLOW
        );
        expect(store.has("loan", "alice")).toBe(false);
    });

    test("a batch with one bad record writes nothing", () => {
        expectLedgerError(() => store.commit([
            { table: "collateral", participant: "alice", account: { deposit: 5n, interest: 0n, lastAccrualTick: 1n } },
            { table: "loan", participant: "alice", account: { deposit: 0n, interest: -3n, lastAccrualTick: 1n } },
        ]), ERROR_CODES.ARITHMETIC_OVERFLOW);
        expect(store.has("collateral", "alice")).toBe(false);
    });

    test("reports participants and stats", () => {
        store.put("collateral", "alice", { deposit: 5n, interest: 0n, lastAccrualTick: 1n });
        store.put("collateral", "bob", { deposit: 0n, interest: 0n, lastAccrualTick: 1n });
        store.put("loan", "alice", { deposit: 2n, interest: 0n, lastAccrualTick: 1n });

        expect(store.participants("collateral")).toEqual(["alice", "bob"]);
        expect(store.getStats()).toEqual({
            collateral: { records: 2, nonZero: 1 },
            base: { records: 0, nonZero: 0 },
            loan: { records: 1, nonZero: 1 },
        });
    });
});
