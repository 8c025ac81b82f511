/**
 * Swap Executor
 *
 * Runs registerAsset / createPair / swap as all-or-nothing transitions:
 * 1. take the exchange lock (a re-entrant call fails immediately)
 * 2. validate and price against the state observed at entry
 * 3. move value through the ledger as one unit
 * 4. commit reserves, then notify
 */

import { DEFAULT_FEE, DEFAULT_POOL_ACCOUNT, assertFeeRate, type FeeRate } from '../../protocol/params/exchange.js';
import { ReentrancyGuard } from '../../protocol/security/reentrancy-guard.js';
import { SafeMath } from '../../protocol/utils/safe-math.js';
import { logger } from '../../protocol/utils/logger.js';
import type { AccountId, AssetId, TokenLedger } from '../ledger/TokenLedger.js';
import { ExchangeError } from '../../protocol/errors/ExchangeError.js';
import { LoggingEventSink, type EventSink } from './events.js';
import { PairStore, type Pair, type PairStoreSnapshot, type PairStoreView } from './PairStore.js';
import { quoteOutput, quoteWithDetails, type QuoteDetails } from './PricingEngine.js';

const log = logger.child('Executor');

const EXCHANGE_LOCK = 'exchange';

interface Refund {
    asset: AssetId;
    to: AccountId;
    amount: bigint;
}

interface TransferLeg {
    run: () => void;
    /** Transfer that returns this leg's value; null for the pool's payout */
    undo: Refund | null;
}

export interface SwapExecutorOptions {
    ledger: TokenLedger;
    events?: EventSink;
    fee?: FeeRate;
    /** Account the ledger operates as; holds every pool's reserves */
    poolAccount?: AccountId;
    guard?: ReentrancyGuard;
}

export interface SwapResult {
    assetIn: AssetId;
    assetOut: AssetId;
    amountIn: bigint;
    amountOut: bigint;
    pair: Pair;
}

export class SwapExecutor {
    /** Committed state only; every mutation goes through the executor */
    readonly pairs: PairStoreView;
    readonly fee: FeeRate;
    readonly poolAccount: AccountId;
    private readonly ledger: TokenLedger;
    private readonly store = new PairStore();
    private readonly events: EventSink;
    private readonly guard: ReentrancyGuard;

    constructor(options: SwapExecutorOptions) {
        this.ledger = options.ledger;
        this.pairs = Object.freeze({
            find: (a: AssetId, b: AssetId) => this.store.find(a, b),
            lookup: (a: AssetId, b: AssetId) => this.store.lookup(a, b),
            listPairs: () => this.store.listPairs(),
            listAssets: () => this.store.listAssets(),
            isRegistered: (asset: AssetId) => this.store.isRegistered(asset),
        });
        this.events = options.events ?? new LoggingEventSink();
        this.fee = assertFeeRate(options.fee ?? DEFAULT_FEE);
        this.poolAccount = options.poolAccount ?? DEFAULT_POOL_ACCOUNT;
        this.guard = options.guard ?? new ReentrancyGuard();
    }

    // ========== MUTATIONS ==========

    registerAsset(asset: AssetId): void {
        this.guard.run(EXCHANGE_LOCK, () => {
            this.store.registerAsset(asset, (a) => this.ledger.totalSupply(a));
            this.notify('assetRegistered', (sink) => sink.assetRegistered(asset));
        });
    }

    /**
     * Seed a new pool with the creator's deposit. amountA belongs to assetA
     * whatever the canonical order turns out to be.
     */
    createPair(caller: AccountId, assetA: AssetId, assetB: AssetId, amountA: bigint, amountB: bigint): Pair {
        return this.guard.run(EXCHANGE_LOCK, () => {
            const pair = this.store.prepareCreate(assetA, assetB, amountA, amountB);

            this.settle([
                {
                    run: () => this.ledger.transferFrom(assetA, caller, this.poolAccount, amountA),
                    undo: { asset: assetA, to: caller, amount: amountA },
                },
                {
                    run: () => this.ledger.transferFrom(assetB, caller, this.poolAccount, amountB),
                    undo: { asset: assetB, to: caller, amount: amountB },
                },
            ]);

            this.store.insertPair(pair);

            this.notify('pairCreated', (sink) => sink.pairCreated(pair.assetLow, pair.assetHigh));
            return pair;
        });
    }

    swap(caller: AccountId, assetIn: AssetId, assetOut: AssetId, amountIn: bigint): SwapResult {
        return this.guard.run(EXCHANGE_LOCK, () => {
            const { pair, reserveIn, reserveOut, inIsLow } = this.resolve(assetIn, assetOut, amountIn);
            const amountOut = quoteOutput(amountIn, reserveIn, reserveOut, this.fee.numerator, this.fee.denominator);

            const newReserveIn = SafeMath.add(reserveIn, amountIn);
            const newReserveOut = SafeMath.sub(reserveOut, amountOut);
            if (newReserveIn * newReserveOut < reserveIn * reserveOut) {
                throw new Error(`INVARIANT VIOLATION: ${newReserveIn * newReserveOut} < ${reserveIn * reserveOut}`);
            }

            this.settle([
                {
                    run: () => this.ledger.transferFrom(assetIn, caller, this.poolAccount, amountIn),
                    undo: { asset: assetIn, to: caller, amount: amountIn },
                },
                {
                    run: () => this.ledger.transfer(assetOut, caller, amountOut),
                    undo: null,
                },
            ]);

            const reserveLow = inIsLow ? newReserveIn : newReserveOut;
            const reserveHigh = inIsLow ? newReserveOut : newReserveIn;
            this.store.setReserves(pair.assetLow, pair.assetHigh, reserveLow, reserveHigh);

            this.notify('swapExecuted', (sink) => sink.swapExecuted({
                caller,
                assetLow: pair.assetLow,
                assetHigh: pair.assetHigh,
                amountLowIn: inIsLow ? amountIn : 0n,
                amountHighIn: inIsLow ? 0n : amountIn,
                amountLowOut: inIsLow ? 0n : amountOut,
                amountHighOut: inIsLow ? amountOut : 0n,
            }));

            return {
                assetIn,
                assetOut,
                amountIn,
                amountOut,
                pair: { assetLow: pair.assetLow, assetHigh: pair.assetHigh, reserveLow, reserveHigh },
            };
        });
    }

    /**
     * Replace every asset and pair with a saved snapshot. Refused while
     * another exchange call is running.
     */
    restore(snapshot: PairStoreSnapshot): void {
        this.guard.run(EXCHANGE_LOCK, () => this.store.restore(snapshot));
    }

    // ========== READ-ONLY ==========

    quote(assetIn: AssetId, assetOut: AssetId, amountIn: bigint): QuoteDetails {
        const { reserveIn, reserveOut } = this.resolve(assetIn, assetOut, amountIn);
        return quoteWithDetails(amountIn, reserveIn, reserveOut, this.fee);
    }

    getPair(a: AssetId, b: AssetId): Pair {
        return this.store.lookup(a, b);
    }

    snapshot(): PairStoreSnapshot {
        return this.store.snapshot();
    }

    // ========== INTERNALS ==========

    private resolve(assetIn: AssetId, assetOut: AssetId, amountIn: bigint): {
        pair: Pair;
        reserveIn: bigint;
        reserveOut: bigint;
        inIsLow: boolean;
    } {
        if (amountIn <= 0n) {
            throw new ExchangeError('InsufficientInput', 'amountIn must be positive');
        }
        if (assetIn === assetOut) {
            throw new ExchangeError('InvalidAssetPair', `${assetIn} → ${assetOut}`);
        }

        const pair = this.store.lookup(assetIn, assetOut);
        const inIsLow = pair.assetLow === assetIn;
        return {
            pair,
            reserveIn: inIsLow ? pair.reserveLow : pair.reserveHigh,
            reserveOut: inIsLow ? pair.reserveHigh : pair.reserveLow,
            inIsLow,
        };
    }

    /**
     * Perform transfer legs in order as one unit. A ledger with atomic()
     * undoes its own partial work; otherwise every completed pull is
     * returned to its owner before the failure propagates.
     */
    private settle(legs: TransferLeg[]): void {
        const ledger = this.ledger;
        if (ledger.atomic) {
            ledger.atomic(() => {
                for (const leg of legs) leg.run();
            });
            return;
        }

        const done: TransferLeg[] = [];
        for (const leg of legs) {
            try {
                leg.run();
            } catch (error) {
                for (const completed of done.reverse()) {
                    if (completed.undo) this.refund(completed.undo, error);
                }
                throw error;
            }
            done.push(leg);
        }
    }

    private refund(undo: Refund, reason: unknown): void {
        try {
            this.ledger.transfer(undo.asset, undo.to, undo.amount);
        } catch (refundError) {
            log.error(`Refund of ${undo.amount} ${undo.asset} to ${undo.to} failed`, refundError);
            throw new ExchangeError('RollbackFailed', `could not return ${undo.amount} ${undo.asset} to ${undo.to}`, { cause: reason });
        }
        log.warn(`↩️ Refunded ${undo.amount} ${undo.asset} to ${undo.to}`);
    }

    private notify(name: keyof EventSink, emit: (sink: EventSink) => void): void {
        try {
            emit(this.events);
        } catch (error) {
            log.error(`Event sink failed on ${name}`, error);
        }
    }
}
