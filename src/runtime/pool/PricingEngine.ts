/**
 * Constant-product pricing (x * y = k), integer only.
 *
 *   effectiveIn = amountIn * (feeDenominator - feeNumerator)
 *   amountOut   = floor(effectiveIn * reserveOut / (reserveIn * feeDenominator + effectiveIn))
 *
 * Division truncates, so rounding always favours the pool and the reserve
 * product never decreases across a swap.
 */

import { DEFAULT_FEE, type FeeRate } from '../../protocol/params/exchange.js';
import { SafeMath } from '../../protocol/utils/safe-math.js';
import { ExchangeError } from '../../protocol/errors/ExchangeError.js';

const BPS = 10_000n;

export interface QuoteDetails {
    amountIn: bigint;
    amountOut: bigint;
    /** Part of amountIn retained by the pool, rounded down */
    fee: bigint;
    reserveIn: bigint;
    reserveOut: bigint;
    /** Shortfall against the spot price, in basis points */
    priceImpactBps: bigint;
}

export function quoteOutput(
    amountIn: bigint,
    reserveIn: bigint,
    reserveOut: bigint,
    feeNumerator: bigint = DEFAULT_FEE.numerator,
    feeDenominator: bigint = DEFAULT_FEE.denominator,
): bigint {
    if (amountIn < 0n) {
        throw new ExchangeError('InsufficientInput', 'amountIn must be non-negative');
    }
    if (reserveIn < 0n || reserveOut < 0n) {
        throw new ExchangeError('InsufficientLiquidity', 'reserves must be non-negative');
    }
    if (feeDenominator <= 0n || feeNumerator < 0n || feeNumerator >= feeDenominator) {
        throw new RangeError(`Invalid fee ${feeNumerator}/${feeDenominator}`);
    }

    const effectiveIn = SafeMath.mul(amountIn, feeDenominator - feeNumerator);
    const numerator = SafeMath.mul(effectiveIn, reserveOut);
    const denominator = SafeMath.add(SafeMath.mul(reserveIn, feeDenominator), effectiveIn);
    const amountOut = denominator === 0n ? 0n : numerator / denominator;

    if (amountOut === 0n) {
        throw new ExchangeError('InsufficientOutput', `${amountIn} in yields nothing against reserves ${reserveIn}/${reserveOut}`);
    }
    // Only reachable with an empty input reserve; never drain the output side
    if (amountOut >= reserveOut) {
        throw new ExchangeError('InsufficientLiquidity', `output ${amountOut} would drain reserve ${reserveOut}`);
    }
    return amountOut;
}

export function quoteWithDetails(
    amountIn: bigint,
    reserveIn: bigint,
    reserveOut: bigint,
    fee: FeeRate = DEFAULT_FEE,
): QuoteDetails {
    const amountOut = quoteOutput(amountIn, reserveIn, reserveOut, fee.numerator, fee.denominator);

    // reserveIn > 0 here: quoteOutput rejects an empty input reserve
    const spotOut = (amountIn * reserveOut) / reserveIn;
    const priceImpactBps = spotOut === 0n ? 0n : ((spotOut - amountOut) * BPS) / spotOut;

    return {
        amountIn,
        amountOut,
        fee: (amountIn * fee.numerator) / fee.denominator,
        reserveIn,
        reserveOut,
        priceImpactBps,
    };
}
