/**
 * HTTP-agnostic request handling for the exchange node. Routes hand raw
 * bodies and params in and send back whatever ApiReply comes out.
 */

import { inputValidator, type ValidationResult } from '../../protocol/security/input-validator.js';
import { logger } from '../../protocol/utils/logger.js';
import { ExchangeError, type Pair } from '../../runtime/pool/index.js';
import type { ExchangeContext } from '../context.js';

const log = logger.child('API');

export type ApiBody =
    | { success: true; data: unknown; warning?: string }
    | { success: false; error: string; code?: string };

export interface ApiReply {
    status: number;
    body: ApiBody;
}

export interface FaucetSettings {
    enabled: boolean;
    maxAmount: bigint;
}

function ok(data: unknown, status: number = 200): ApiReply {
    return { status, body: { success: true, data } };
}

function badRequest(error: string): ApiReply {
    return { status: 400, body: { success: false, error } };
}

function field(source: unknown, name: string): unknown {
    if (typeof source !== 'object' || source === null) return undefined;
    return Object.getOwnPropertyDescriptor(source, name)?.value;
}

export function errorStatus(error: ExchangeError): number {
    if (error.code === 'PairNotFound') return 404;
    switch (error.category) {
        case 'validation': return 400;
        case 'ledger': return 402;
        case 'concurrency': return 409;
        case 'internal': return 500;
    }
}

export function toApiError(error: unknown, fallbackStatus: number = 500): ApiReply {
    if (error instanceof ExchangeError) {
        return { status: errorStatus(error), body: { success: false, error: error.message, code: error.code } };
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    if (fallbackStatus >= 500) {
        log.error(`Unhandled failure: ${message}`, error);
    }
    return { status: fallbackStatus, body: { success: false, error: message } };
}

export function serializePair(pair: Pair): Record<string, string> {
    return {
        assetLow: pair.assetLow,
        assetHigh: pair.assetHigh,
        reserveLow: pair.reserveLow.toString(),
        reserveHigh: pair.reserveHigh.toString(),
        k: (pair.reserveLow * pair.reserveHigh).toString(),
    };
}

/**
 * Collects validated fields; the first failure wins.
 */
class Fields {
    error: string | null = null;

    take<T>(result: ValidationResult<T>, fallback: T): T {
        if (result.valid) return result.value;
        this.error ??= result.error;
        return fallback;
    }
}

export class ExchangeController {
    constructor(
        private readonly context: ExchangeContext,
        private readonly faucet: FaucetSettings = { enabled: false, maxAmount: 0n },
    ) {}

    // ========== ASSETS ==========

    listAssets(): ApiReply {
        return ok({ assets: this.context.executor.pairs.listAssets() });
    }

    registerAsset(body: unknown): ApiReply {
        const asset = inputValidator.validateAsset(field(body, 'asset'));
        if (!asset.valid) return badRequest(asset.error);

        return this.mutate(() => {
            this.context.executor.registerAsset(asset.value);
            return ok({ asset: asset.value }, 201);
        });
    }

    // ========== PAIRS ==========

    listPairs(): ApiReply {
        return ok({ pairs: this.context.executor.pairs.listPairs().map(serializePair) });
    }

    getPair(assetA: unknown, assetB: unknown): ApiReply {
        const fields = new Fields();
        const a = fields.take(inputValidator.validateAsset(assetA, 'assetA'), '');
        const b = fields.take(inputValidator.validateAsset(assetB, 'assetB'), '');
        if (fields.error) return badRequest(fields.error);

        try {
            return ok(serializePair(this.context.executor.getPair(a, b)));
        } catch (error) {
            return toApiError(error);
        }
    }

    createPair(body: unknown): ApiReply {
        const fields = new Fields();
        const caller = fields.take(inputValidator.validateAccount(field(body, 'caller'), 'caller'), '');
        const assetA = fields.take(inputValidator.validateAsset(field(body, 'assetA'), 'assetA'), '');
        const assetB = fields.take(inputValidator.validateAsset(field(body, 'assetB'), 'assetB'), '');
        const amountA = fields.take(inputValidator.validateAmount(field(body, 'amountA'), 'amountA'), 0n);
        const amountB = fields.take(inputValidator.validateAmount(field(body, 'amountB'), 'amountB'), 0n);
        if (fields.error) return badRequest(fields.error);

        return this.mutate(() => {
            const pair = this.context.executor.createPair(caller, assetA, assetB, amountA, amountB);
            return ok(serializePair(pair), 201);
        });
    }

    // ========== TRADING ==========

    quote(query: unknown): ApiReply {
        const fields = new Fields();
        const assetIn = fields.take(inputValidator.validateAsset(field(query, 'assetIn'), 'assetIn'), '');
        const assetOut = fields.take(inputValidator.validateAsset(field(query, 'assetOut'), 'assetOut'), '');
        const amountIn = fields.take(inputValidator.validateAmount(field(query, 'amountIn'), 'amountIn'), 0n);
        if (fields.error) return badRequest(fields.error);

        try {
            const quote = this.context.executor.quote(assetIn, assetOut, amountIn);
            const fee = this.context.executor.fee;
            return ok({
                assetIn,
                assetOut,
                amountIn: quote.amountIn.toString(),
                amountOut: quote.amountOut.toString(),
                fee: quote.fee.toString(),
                feeRate: `${fee.numerator}/${fee.denominator}`,
                reserveIn: quote.reserveIn.toString(),
                reserveOut: quote.reserveOut.toString(),
                priceImpactBps: quote.priceImpactBps.toString(),
            });
        } catch (error) {
            return toApiError(error);
        }
    }

    swap(body: unknown): ApiReply {
        const fields = new Fields();
        const caller = fields.take(inputValidator.validateAccount(field(body, 'caller'), 'caller'), '');
        const assetIn = fields.take(inputValidator.validateAsset(field(body, 'assetIn'), 'assetIn'), '');
        const assetOut = fields.take(inputValidator.validateAsset(field(body, 'assetOut'), 'assetOut'), '');
        const amountIn = fields.take(inputValidator.validateAmount(field(body, 'amountIn'), 'amountIn'), 0n);
        if (fields.error) return badRequest(fields.error);

        return this.mutate(() => {
            const result = this.context.executor.swap(caller, assetIn, assetOut, amountIn);
            return ok({
                assetIn,
                assetOut,
                amountIn: result.amountIn.toString(),
                amountOut: result.amountOut.toString(),
                pair: serializePair(result.pair),
            });
        });
    }

    // ========== BANK (sandbox ledger) ==========

    createBankAsset(body: unknown): ApiReply {
        const fields = new Fields();
        const asset = fields.take(inputValidator.validateAsset(field(body, 'asset')), '');
        const supply = fields.take(inputValidator.validateAmount(field(body, 'supply'), 'supply'), 0n);
        const holder = fields.take(inputValidator.validateAccount(field(body, 'holder'), 'holder'), '');
        if (fields.error) return badRequest(fields.error);

        return this.mutate(() => {
            this.context.bank.createAsset(asset, supply, holder);
            return ok({ asset, supply: supply.toString(), holder }, 201);
        }, 400);
    }

    approve(body: unknown): ApiReply {
        const fields = new Fields();
        const asset = fields.take(inputValidator.validateAsset(field(body, 'asset')), '');
        const owner = fields.take(inputValidator.validateAccount(field(body, 'owner'), 'owner'), '');
        const amount = fields.take(inputValidator.validateAmount(field(body, 'amount')), 0n);
        if (fields.error) return badRequest(fields.error);

        const spender = this.context.executor.poolAccount;
        return this.mutate(() => {
            this.context.bank.approve(asset, owner, spender, amount);
            return ok({ asset, owner, spender, amount: amount.toString() });
        }, 400);
    }

    balance(asset: unknown, account: unknown): ApiReply {
        const fields = new Fields();
        const a = fields.take(inputValidator.validateAsset(asset), '');
        const acc = fields.take(inputValidator.validateAccount(account), '');
        if (fields.error) return badRequest(fields.error);

        const pool = this.context.executor.poolAccount;
        return ok({
            asset: a,
            account: acc,
            balance: this.context.bank.balanceOf(a, acc).toString(),
            allowance: this.context.bank.allowance(a, acc, pool).toString(),
        });
    }

    requestFaucet(body: unknown): ApiReply {
        if (!this.faucet.enabled) {
            return { status: 403, body: { success: false, error: 'Faucet is disabled' } };
        }

        const fields = new Fields();
        const asset = fields.take(inputValidator.validateAsset(field(body, 'asset')), '');
        const to = fields.take(inputValidator.validateAccount(field(body, 'to'), 'to'), '');
        const amount = fields.take(inputValidator.validateAmount(field(body, 'amount')), 0n);
        if (fields.error) return badRequest(fields.error);
        if (amount > this.faucet.maxAmount) {
            return badRequest(`amount exceeds faucet limit of ${this.faucet.maxAmount}`);
        }

        return this.mutate(() => {
            this.context.bank.mint(asset, to, amount);
            return ok({ asset, to, amount: amount.toString(), balance: this.context.bank.balanceOf(asset, to).toString() });
        }, 400);
    }

    // ========== INTERNALS ==========

    /**
     * Run a state change and persist it. Nothing is saved for a failed call.
     * A failed save keeps the reply of the applied change and adds a warning.
     */
    private mutate(fn: () => ApiReply, fallbackStatus: number = 500): ApiReply {
        let reply: ApiReply;
        try {
            reply = fn();
        } catch (error) {
            return toApiError(error, fallbackStatus);
        }
        try {
            this.context.persist();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            log.error(`💾 State not saved: ${message}`, error);
            if (reply.body.success) {
                return { status: reply.status, body: { ...reply.body, warning: `state not saved: ${message}` } };
            }
        }
        return reply;
    }
}
