/**
 * Exchange Parameters (Protocol Level)
 *
 * Economic constants shared by every pool of one exchange instance.
 * Node-local settings (ports, paths, rate limits) live in node/config.ts.
 */

export interface FeeRate {
    numerator: bigint;
    denominator: bigint;
}

// 0.3% = 3/1000 (the 997/1000 input multiplier)
export const DEFAULT_FEE: FeeRate = { numerator: 3n, denominator: 1000n };

export const DEFAULT_POOL_ACCOUNT = 'xyk-pool';

function readBigInt(name: string, fallback: bigint): bigint {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    if (!/^\d+$/.test(raw.trim())) {
        throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
    }
    return BigInt(raw.trim());
}

export function assertFeeRate(fee: FeeRate): FeeRate {
    if (fee.denominator <= 0n) {
        throw new Error('Fee denominator must be positive');
    }
    if (fee.numerator < 0n || fee.numerator >= fee.denominator) {
        throw new Error(`Fee ${fee.numerator}/${fee.denominator} must be in [0, 1)`);
    }
    return fee;
}

export function loadExchangeParams(): { fee: FeeRate; poolAccount: string } {
    return {
        fee: assertFeeRate({
            numerator: readBigInt('XYK_FEE_NUMERATOR', DEFAULT_FEE.numerator),
            denominator: readBigInt('XYK_FEE_DENOMINATOR', DEFAULT_FEE.denominator),
        }),
        poolAccount: process.env.POOL_ACCOUNT?.trim() || DEFAULT_POOL_ACCOUNT,
    };
}
