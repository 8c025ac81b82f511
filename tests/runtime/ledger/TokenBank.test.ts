import { describe, it, expect, beforeEach } from 'vitest';
import { TokenBank } from '../../../src/runtime/ledger/TokenBank.js';
import { ExchangeError } from '../../../src/protocol/errors/ExchangeError.js';

function codeOf(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (error) {
        return error instanceof ExchangeError ? error.code : 'non-exchange-error';
    }
    return undefined;
}

describe('TokenBank', () => {
    let bank: TokenBank;
    beforeEach(() => {
        bank = new TokenBank();
        bank.createAsset('X', 1000n, 'alice');
    });

    it('issues supply to the holder', () => {
        expect(bank.totalSupply('X')).toBe(1000n);
        expect(bank.balanceOf('X', 'alice')).toBe(1000n);
        expect(bank.totalSupply('unknown')).toBe(0n);
    });

    it('mints into supply', () => {
        bank.mint('X', 'bob', 50n);
        expect(bank.totalSupply('X')).toBe(1050n);
        expect(bank.balanceOf('X', 'bob')).toBe(50n);
    });

    it('refuses to create an asset twice', () => {
        expect(() => bank.createAsset('X', 1n, 'bob')).toThrow('already exists');
    });

    describe('ledgerFor', () => {
        it('needs an allowance for transferFrom', () => {
            const ledger = bank.ledgerFor('pool');
            expect(codeOf(() => ledger.transferFrom('X', 'alice', 'pool', 10n))).toBe('InsufficientAllowance');
        });

        it('needs a balance behind the allowance', () => {
            bank.approve('X', 'alice', 'pool', 5000n);
            const ledger = bank.ledgerFor('pool');
            expect(codeOf(() => ledger.transferFrom('X', 'alice', 'pool', 2000n))).toBe('InsufficientBalance');
            expect(bank.allowance('X', 'alice', 'pool')).toBe(5000n);
        });

        it('spends the allowance', () => {
            bank.approve('X', 'alice', 'pool', 300n);
            bank.ledgerFor('pool').transferFrom('X', 'alice', 'pool', 100n);
            expect(bank.balanceOf('X', 'alice')).toBe(900n);
            expect(bank.balanceOf('X', 'pool')).toBe(100n);
            expect(bank.allowance('X', 'alice', 'pool')).toBe(200n);
        });

        it('sends from the operator balance', () => {
            const ledger = bank.ledgerFor('alice');
            ledger.transfer('X', 'bob', 400n);
            expect(bank.balanceOf('X', 'bob')).toBe(400n);
            expect(codeOf(() => bank.ledgerFor('bob').transfer('X', 'carol', 401n))).toBe('InsufficientBalance');
        });
    });

    describe('onTransfer', () => {
        it('reports each completed transfer', () => {
            const seen: string[] = [];
            bank.onTransfer((t) => seen.push(`${t.from}->${t.to}:${t.amount}:${t.operator}`));
            bank.ledgerFor('alice').transfer('X', 'bob', 7n);
            expect(seen).toEqual(['alice->bob:7:alice']);
        });

        it('reverts the transfer when the hook throws', () => {
            bank.approve('X', 'alice', 'pool', 100n);
            bank.onTransfer(() => { throw new Error('rejected by receiver'); });
            expect(() => bank.ledgerFor('pool').transferFrom('X', 'alice', 'pool', 60n)).toThrow('rejected by receiver');
            expect(bank.balanceOf('X', 'alice')).toBe(1000n);
            expect(bank.balanceOf('X', 'pool')).toBe(0n);
            expect(bank.allowance('X', 'alice', 'pool')).toBe(100n);
        });
    });

    describe('atomic', () => {
        it('undoes every transfer made inside a failing unit', () => {
            bank.createAsset('Y', 10n, 'pool');
            bank.approve('X', 'alice', 'pool', 100n);
            const ledger = bank.ledgerFor('pool');

            expect(() => bank.atomic(() => {
                ledger.transferFrom('X', 'alice', 'pool', 100n);
                ledger.transfer('Y', 'alice', 11n);
            })).toThrow(ExchangeError);

            expect(bank.balanceOf('X', 'alice')).toBe(1000n);
            expect(bank.balanceOf('X', 'pool')).toBe(0n);
            expect(bank.allowance('X', 'alice', 'pool')).toBe(100n);
            expect(bank.balanceOf('Y', 'pool')).toBe(10n);
        });

        it('returns the unit result on success', () => {
            expect(bank.atomic(() => 42)).toBe(42);
        });
    });

    it('restores a snapshot', () => {
        bank.approve('X', 'alice', 'pool', 30n);
        const copy = new TokenBank();
        copy.restore(bank.snapshot());
        expect(copy.balanceOf('X', 'alice')).toBe(1000n);
        expect(copy.allowance('X', 'alice', 'pool')).toBe(30n);
        expect(copy.totalSupply('X')).toBe(1000n);
        expect(copy.snapshot()).toEqual({
            assets: {
                X: { supply: '1000', balances: { alice: '1000' }, allowances: { alice: { pool: '30' } } },
            },
        });
    });
});
