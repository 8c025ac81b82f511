/**
 * Wires one exchange instance: in-memory bank, the pool's ledger view,
 * the executor and optional on-disk persistence.
 */

import { loadExchangeParams, type FeeRate } from '../protocol/params/exchange.js';
import { Storage } from '../protocol/storage/index.js';
import { logger } from '../protocol/utils/logger.js';
import { TokenBank } from '../runtime/ledger/index.js';
import { CompositeEventSink, LoggingEventSink, SwapExecutor, type EventSink } from '../runtime/pool/index.js';

const log = logger.child('Context');

export interface ExchangeContext {
    bank: TokenBank;
    executor: SwapExecutor;
    storage: Storage | null;
    /** Write current state to storage; no-op without storage */
    persist(): void;
}

export interface ContextOptions {
    storage?: Storage | null;
    fee?: FeeRate;
    poolAccount?: string;
    /** Extra sinks notified after the logging sink */
    sinks?: EventSink[];
}

export function createExchangeContext(options: ContextOptions = {}): ExchangeContext {
    const params = loadExchangeParams();
    const storage = options.storage ?? null;
    const bank = new TokenBank();
    const extraSinks = options.sinks ?? [];

    const poolAccount = options.poolAccount ?? params.poolAccount;
    const executor = new SwapExecutor({
        ledger: bank.ledgerFor(poolAccount),
        events: extraSinks.length > 0
            ? new CompositeEventSink([new LoggingEventSink(), ...extraSinks])
            : new LoggingEventSink(),
        fee: options.fee ?? params.fee,
        poolAccount,
    });

    const saved = storage?.loadState() ?? null;
    if (saved) {
        bank.restore(saved.bank);
        executor.restore(saved.exchange);
    }

    log.info(`⚙️ Exchange ready: fee ${executor.fee.numerator}/${executor.fee.denominator}, pool account ${poolAccount}`);

    return {
        bank,
        executor,
        storage,
        persist() {
            storage?.saveState({ exchange: executor.snapshot(), bank: bank.snapshot() });
        },
    };
}
