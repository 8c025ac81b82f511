/**
 * Pair Store
 *
 * Single source of truth for registered assets and pool reserves. Each
 * unordered asset pair has exactly one record, keyed by its canonical
 * (low, high) order; both call orders resolve to it.
 */

import { logger } from '../../protocol/utils/logger.js';
import type { AssetId } from '../ledger/TokenLedger.js';
import { ExchangeError } from '../../protocol/errors/ExchangeError.js';

const log = logger.child('PairStore');

// ========== INTERFACES ==========

export interface Pair {
    readonly assetLow: AssetId;
    readonly assetHigh: AssetId;
    readonly reserveLow: bigint;
    readonly reserveHigh: bigint;
}

export interface CanonicalPair {
    low: AssetId;
    high: AssetId;
    /** true when the caller's first asset is the high side */
    flipped: boolean;
}

export interface PairStoreSnapshot {
    assets: AssetId[];
    pairs: Array<{
        assetLow: AssetId;
        assetHigh: AssetId;
        reserveLow: string;   // bigint as string for JSON
        reserveHigh: string;
    }>;
}

/** Read-only access to committed pool state */
export interface PairStoreView {
    find(a: AssetId, b: AssetId): Pair | undefined;
    lookup(a: AssetId, b: AssetId): Pair;
    listPairs(): Pair[];
    listAssets(): AssetId[];
    isRegistered(asset: AssetId): boolean;
}

interface PairRecord {
    readonly assetLow: AssetId;
    readonly assetHigh: AssetId;
    reserveLow: bigint;
    reserveHigh: bigint;
}

// ========== CANONICAL ORDER ==========

export function canonicalize(a: AssetId, b: AssetId): CanonicalPair {
    if (a === b) {
        throw new ExchangeError('IdenticalAssets', `${a} paired with itself`);
    }
    return a < b ? { low: a, high: b, flipped: false } : { low: b, high: a, flipped: true };
}

function pairKey(low: AssetId, high: AssetId): string {
    return JSON.stringify([low, high]);
}

// ========== STORE ==========

export class PairStore implements PairStoreView {
    private registered: Set<AssetId> = new Set();
    private pairs: Map<string, PairRecord> = new Map();

    // ========== ASSETS ==========

    /**
     * Admit an asset once. supplyOf is the external supply query; zero
     * supply or a failing query rejects the asset.
     */
    registerAsset(asset: AssetId, supplyOf: (asset: AssetId) => bigint): void {
        if (this.registered.has(asset)) {
            throw new ExchangeError('DuplicateAsset', `${asset} is already registered`);
        }

        let supply: bigint;
        try {
            supply = supplyOf(asset);
        } catch (error) {
            if (error instanceof ExchangeError && error.code === 'ReentrancyViolation') throw error;
            throw new ExchangeError('InvalidAsset', `supply query failed for ${asset}`, { cause: error });
        }
        if (supply <= 0n) {
            throw new ExchangeError('InvalidAsset', `${asset} reports zero supply`);
        }

        this.registered.add(asset);
        log.debug(`Supply of ${asset}: ${supply}`);
    }

    isRegistered(asset: AssetId): boolean {
        return this.registered.has(asset);
    }

    listAssets(): AssetId[] {
        return Array.from(this.registered).sort();
    }

    // ========== PAIRS ==========

    /**
     * Validate a creation request and map the caller's amounts onto the
     * canonical sides. Does not mutate.
     */
    prepareCreate(a: AssetId, b: AssetId, amountA: bigint, amountB: bigint): Pair {
        const { low, high, flipped } = canonicalize(a, b);

        for (const asset of [a, b]) {
            if (!this.registered.has(asset)) {
                throw new ExchangeError('AssetNotRegistered', asset);
            }
        }
        if (this.pairs.has(pairKey(low, high))) {
            throw new ExchangeError('PairAlreadyExists', `${low}/${high}`);
        }
        if (amountA <= 0n || amountB <= 0n) {
            throw new ExchangeError('InsufficientLiquidity', 'both initial amounts must be positive');
        }

        return {
            assetLow: low,
            assetHigh: high,
            reserveLow: flipped ? amountB : amountA,
            reserveHigh: flipped ? amountA : amountB,
        };
    }

    insertPair(pair: Pair): void {
        const { low, high } = canonicalize(pair.assetLow, pair.assetHigh);
        if (low !== pair.assetLow) {
            throw new Error(`Pair ${pair.assetLow}/${pair.assetHigh} is not in canonical order`);
        }
        if (pair.reserveLow <= 0n || pair.reserveHigh <= 0n) {
            throw new ExchangeError('InsufficientLiquidity', `${low}/${high} needs positive reserves`);
        }
        const key = pairKey(low, high);
        if (this.pairs.has(key)) {
            throw new ExchangeError('PairAlreadyExists', `${low}/${high}`);
        }
        this.pairs.set(key, { ...pair });
    }

    find(a: AssetId, b: AssetId): Pair | undefined {
        if (a === b) return undefined;
        const { low, high } = canonicalize(a, b);
        const record = this.pairs.get(pairKey(low, high));
        return record ? { ...record } : undefined;
    }

    lookup(a: AssetId, b: AssetId): Pair {
        const pair = this.find(a, b);
        if (!pair) {
            throw new ExchangeError('PairNotFound', `${a}/${b}`);
        }
        return pair;
    }

    /**
     * Overwrite the reserves of an existing pair. Asset identities never
     * change after creation.
     */
    setReserves(assetLow: AssetId, assetHigh: AssetId, reserveLow: bigint, reserveHigh: bigint): void {
        const record = this.pairs.get(pairKey(assetLow, assetHigh));
        if (!record) {
            throw new ExchangeError('PairNotFound', `${assetLow}/${assetHigh}`);
        }
        if (reserveLow < 0n || reserveHigh < 0n) {
            throw new RangeError('Reserves must be non-negative');
        }
        record.reserveLow = reserveLow;
        record.reserveHigh = reserveHigh;
    }

    listPairs(): Pair[] {
        return Array.from(this.pairs.entries())
            .sort(([x], [y]) => (x < y ? -1 : x > y ? 1 : 0))
            .map(([, record]) => ({ ...record }));
    }

    // ========== SERIALIZATION ==========

    snapshot(): PairStoreSnapshot {
        return {
            assets: this.listAssets(),
            pairs: this.listPairs().map((pair) => ({
                assetLow: pair.assetLow,
                assetHigh: pair.assetHigh,
                reserveLow: pair.reserveLow.toString(),
                reserveHigh: pair.reserveHigh.toString(),
            })),
        };
    }

    /**
     * Replace the whole store. Either every record loads or nothing changes.
     */
    restore(data: PairStoreSnapshot): void {
        const next = new PairStore();
        for (const asset of data.assets) {
            if (next.registered.has(asset)) {
                throw new ExchangeError('DuplicateAsset', `${asset} stored twice`);
            }
            next.registered.add(asset);
        }
        for (const pair of data.pairs) {
            for (const asset of [pair.assetLow, pair.assetHigh]) {
                if (!next.registered.has(asset)) {
                    throw new ExchangeError('AssetNotRegistered', `${asset} in stored pair`);
                }
            }
            next.insertPair({
                assetLow: pair.assetLow,
                assetHigh: pair.assetHigh,
                reserveLow: BigInt(pair.reserveLow),
                reserveHigh: BigInt(pair.reserveHigh),
            });
        }

        this.registered = next.registered;
        this.pairs = next.pairs;
        log.info(`📂 Store loaded: ${this.registered.size} assets, ${this.pairs.size} pairs`);
    }
}
