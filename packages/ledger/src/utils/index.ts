import { MAX_UINT256 } from "../constants";
import { createError } from "../errors";

export function precision(n: bigint = 1n, decimals: bigint = 18n): bigint {
    return n * 10n ** decimals;
}

/**
 * Fail with ArithmeticOverflow if a value leaves the unsigned 256-bit range
 */
export function checked(value: bigint, label: string = "value"): bigint {
    if (value < 0n || value > MAX_UINT256) {
        throw createError(
            "ARITHMETIC_OVERFLOW",
            `${label} is outside the unsigned 256-bit range`,
            { value: value.toString() }
        );
    }
    return value;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
    return checked(a + b, "sum");
}

export function checkedMul(...factors: bigint[]): bigint {
    return checked(factors.reduce((acc, factor) => acc * factor, 1n), "product");
}

export function requireAmount(amount: bigint): bigint {
    if (amount < 0n) {
        throw createError("INVALID_AMOUNT", "Amount must not be negative", {
            amount: amount.toString(),
        });
    }
    return checked(amount, "amount");
}

export function requireParticipant(participant: string): string {
    if (typeof participant !== "string" || participant.trim().length === 0) {
        throw createError("INVALID_PARTICIPANT", "Participant identity must be a non-empty string");
    }
    return participant;
}

/**
 * Render a basis-point ratio as a percentage string (15000n -> "150.00%")
 */
export function formatRatio(ratio: bigint): string {
    if (ratio === MAX_UINT256) return "inf";
    const whole = ratio / 100n;
    const fraction = (ratio % 100n).toString().padStart(2, "0");
    return `${whole}.${fraction}%`;
}
