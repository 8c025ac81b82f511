import { describe, it, expect, beforeEach } from 'vitest';
import { PairStore, canonicalize } from '../../../src/runtime/pool/PairStore.js';
import { ExchangeError } from '../../../src/protocol/errors/ExchangeError.js';

const supply = (amount: bigint) => () => amount;

function codeOf(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (error) {
        return error instanceof ExchangeError ? error.code : 'non-exchange-error';
    }
    return undefined;
}

describe('canonicalize', () => {
    it('orders by identifier', () => {
        expect(canonicalize('X', 'Y')).toEqual({ low: 'X', high: 'Y', flipped: false });
        expect(canonicalize('Y', 'X')).toEqual({ low: 'X', high: 'Y', flipped: true });
    });

    it('rejects identical assets', () => {
        expect(codeOf(() => canonicalize('X', 'X'))).toBe('IdenticalAssets');
    });
});

describe('PairStore assets', () => {
    let store: PairStore;
    beforeEach(() => { store = new PairStore(); });

    it('registers an asset with supply', () => {
        store.registerAsset('X', supply(10n));
        expect(store.isRegistered('X')).toBe(true);
        expect(store.listAssets()).toEqual(['X']);
    });

    it('rejects a duplicate and keeps the set unchanged', () => {
        store.registerAsset('X', supply(10n));
        expect(codeOf(() => store.registerAsset('X', supply(10n)))).toBe('DuplicateAsset');
        expect(store.listAssets()).toEqual(['X']);
    });

    it('rejects zero supply', () => {
        expect(codeOf(() => store.registerAsset('X', supply(0n)))).toBe('InvalidAsset');
        expect(store.isRegistered('X')).toBe(false);
    });

    it('rejects an asset whose supply query throws', () => {
        const failing = () => { throw new Error('no such contract'); };
        let caught: unknown;
        try {
            store.registerAsset('X', failing);
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(ExchangeError);
        expect(caught instanceof ExchangeError && caught.code).toBe('InvalidAsset');
        expect(caught instanceof Error && caught.cause instanceof Error && caught.cause.message).toBe('no such contract');
    });
});

describe('PairStore pairs', () => {
    let store: PairStore;
    beforeEach(() => {
        store = new PairStore();
        store.registerAsset('X', supply(1n));
        store.registerAsset('Y', supply(1n));
    });

    it('maps amounts onto canonical sides', () => {
        expect(store.prepareCreate('Y', 'X', 2000n, 1000n)).toEqual({
            assetLow: 'X',
            assetHigh: 'Y',
            reserveLow: 1000n,
            reserveHigh: 2000n,
        });
    });

    it('validates creation requests', () => {
        expect(codeOf(() => store.prepareCreate('X', 'X', 1n, 1n))).toBe('IdenticalAssets');
        expect(codeOf(() => store.prepareCreate('X', 'Z', 1n, 1n))).toBe('AssetNotRegistered');
        expect(codeOf(() => store.prepareCreate('X', 'Y', 0n, 1n))).toBe('InsufficientLiquidity');
        expect(codeOf(() => store.prepareCreate('X', 'Y', 1n, 0n))).toBe('InsufficientLiquidity');
    });

    it('stores one record for both orders', () => {
        store.insertPair(store.prepareCreate('X', 'Y', 1000n, 2000n));
        expect(codeOf(() => store.prepareCreate('Y', 'X', 5n, 5n))).toBe('PairAlreadyExists');
        expect(store.lookup('X', 'Y')).toEqual(store.lookup('Y', 'X'));
        expect(store.listPairs()).toHaveLength(1);
    });

    it('fails lookup for a missing pair', () => {
        expect(codeOf(() => store.lookup('X', 'Y'))).toBe('PairNotFound');
        expect(store.find('X', 'Y')).toBeUndefined();
        expect(store.find('X', 'X')).toBeUndefined();
    });

    it('refuses non-canonical or empty records', () => {
        expect(() => store.insertPair({ assetLow: 'Y', assetHigh: 'X', reserveLow: 1n, reserveHigh: 1n }))
            .toThrow('not in canonical order');
        expect(codeOf(() => store.insertPair({ assetLow: 'X', assetHigh: 'Y', reserveLow: 0n, reserveHigh: 1n })))
            .toBe('InsufficientLiquidity');
    });

    it('updates reserves in place', () => {
        store.insertPair(store.prepareCreate('X', 'Y', 1000n, 2000n));
        store.setReserves('X', 'Y', 1100n, 1819n);
        expect(store.lookup('Y', 'X')).toEqual({ assetLow: 'X', assetHigh: 'Y', reserveLow: 1100n, reserveHigh: 1819n });
        expect(codeOf(() => store.setReserves('X', 'Z', 1n, 1n))).toBe('PairNotFound');
    });
});

describe('PairStore snapshots', () => {
    it('restores what it saved', () => {
        const store = new PairStore();
        store.registerAsset('X', supply(1n));
        store.registerAsset('Y', supply(1n));
        store.insertPair(store.prepareCreate('Y', 'X', 2000n, 1000n));

        const snapshot = store.snapshot();
        expect(snapshot).toEqual({
            assets: ['X', 'Y'],
            pairs: [{ assetLow: 'X', assetHigh: 'Y', reserveLow: '1000', reserveHigh: '2000' }],
        });

        const restored = new PairStore();
        restored.restore(snapshot);
        expect(restored.lookup('X', 'Y').reserveHigh).toBe(2000n);
        expect(restored.listAssets()).toEqual(['X', 'Y']);
    });

    it('leaves the store untouched when a record is invalid', () => {
        const store = new PairStore();
        store.registerAsset('A', supply(1n));

        expect(() => store.restore({
            assets: ['X', 'Y'],
            pairs: [{ assetLow: 'Y', assetHigh: 'X', reserveLow: '1', reserveHigh: '1' }],
        })).toThrow();
        expect(codeOf(() => store.restore({
            assets: ['X'],
            pairs: [{ assetLow: 'X', assetHigh: 'Y', reserveLow: '1', reserveHigh: '1' }],
        }))).toBe('AssetNotRegistered');

        expect(store.listAssets()).toEqual(['A']);
        expect(store.listPairs()).toEqual([]);
    });
});
