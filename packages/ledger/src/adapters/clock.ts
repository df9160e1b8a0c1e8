/**
 * Current tick (block height) used for interest accrual
 */
export interface TickSource {
    currentTick(): bigint;
}

/**
 * Tick source advanced by hand. Starts at 1 since tick 0 marks an untouched account.
 */
export class ManualClock implements TickSource {
    private tick: bigint;

    constructor(start: bigint = 1n) {
        if (start < 1n) {
            throw new Error("Clock must start at tick 1 or later");
        }
        this.tick = start;
    }

    currentTick(): bigint {
        return this.tick;
    }

    advance(ticks: bigint = 1n): bigint {
        if (ticks < 0n) {
            throw new Error("Cannot move the clock backwards");
        }
        this.tick += ticks;
        return this.tick;
    }

    set(tick: bigint): void {
        if (tick < this.tick) {
            throw new Error(`Cannot move the clock back from ${this.tick} to ${tick}`);
        }
        this.tick = tick;
    }
}
