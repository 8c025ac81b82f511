import { describe, it, expect } from 'vitest';
import { quoteOutput, quoteWithDetails } from '../../../src/runtime/pool/PricingEngine.js';
import { ExchangeError } from '../../../src/protocol/errors/ExchangeError.js';

function codeOf(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (error) {
        return error instanceof ExchangeError ? error.code : 'non-exchange-error';
    }
    return undefined;
}

describe('quoteOutput', () => {
    it('prices 100 in against 1000/2000 at 0.3% to 181', () => {
        expect(quoteOutput(100n, 1000n, 2000n)).toBe(181n);
        expect(quoteOutput(100n, 1000n, 2000n, 3n, 1000n)).toBe(181n);
    });

    it('applies a custom fee', () => {
        // 1%: 99000 * 2000 / (1000000 + 99000) = 180.16
        expect(quoteOutput(100n, 1000n, 2000n, 10n, 1000n)).toBe(180n);
    });

    it('rejects a quote that rounds to zero', () => {
        expect(codeOf(() => quoteOutput(1n, 1000n, 1000n))).toBe('InsufficientOutput');
        expect(codeOf(() => quoteOutput(0n, 1000n, 1000n))).toBe('InsufficientOutput');
    });

    it('never pays out the whole output reserve', () => {
        expect(quoteOutput(10n ** 30n, 1000n, 2000n)).toBe(1999n);
        expect(codeOf(() => quoteOutput(100n, 0n, 2000n))).toBe('InsufficientLiquidity');
    });

    it('rejects negative input', () => {
        expect(codeOf(() => quoteOutput(-1n, 1000n, 2000n))).toBe('InsufficientInput');
    });

    it('rejects a fee outside [0, 1)', () => {
        expect(() => quoteOutput(100n, 1000n, 2000n, 1000n, 1000n)).toThrow(RangeError);
        expect(() => quoteOutput(100n, 1000n, 2000n, 1n, 0n)).toThrow(RangeError);
    });

    it('is non-decreasing in amountIn', () => {
        let previous = 0n;
        for (let amount = 1n; amount <= 5000n; amount += 7n) {
            const out = quoteOutput(amount, 1000n, 2000n);
            expect(out).toBeGreaterThanOrEqual(previous);
            previous = out;
        }
    });

    it('keeps the reserve product from decreasing', () => {
        const reserveIn = 123_456n;
        const reserveOut = 987_654n;
        for (const amountIn of [1n, 10n, 999n, 50_000n, 10_000_000n]) {
            const out = quoteOutput(amountIn, reserveIn, reserveOut);
            expect((reserveIn + amountIn) * (reserveOut - out)).toBeGreaterThanOrEqual(reserveIn * reserveOut);
        }
    });
});

describe('quoteWithDetails', () => {
    it('reports fee and price impact', () => {
        const quote = quoteWithDetails(100n, 1000n, 2000n);
        expect(quote).toEqual({
            amountIn: 100n,
            amountOut: 181n,
            fee: 0n,
            reserveIn: 1000n,
            reserveOut: 2000n,
            // spot 200, got 181
            priceImpactBps: 950n,
        });
    });

    it('rounds the fee down', () => {
        expect(quoteWithDetails(1000n, 100_000n, 100_000n).fee).toBe(3n);
    });
});
