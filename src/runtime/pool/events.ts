/**
 * Exchange notifications. Sinks are fire-and-forget: the engine ignores
 * their return value and a throwing sink never undoes committed state.
 */

import { logger } from '../../protocol/utils/logger.js';
import type { AccountId, AssetId } from '../ledger/TokenLedger.js';

const log = logger.child('Events');

export interface SwapExecutedEvent {
    caller: AccountId;
    assetLow: AssetId;
    assetHigh: AssetId;
    amountLowIn: bigint;
    amountHighIn: bigint;
    amountLowOut: bigint;
    amountHighOut: bigint;
}

export interface EventSink {
    assetRegistered(asset: AssetId): void;
    pairCreated(assetLow: AssetId, assetHigh: AssetId): void;
    swapExecuted(event: SwapExecutedEvent): void;
}

export class LoggingEventSink implements EventSink {
    assetRegistered(asset: AssetId): void {
        log.info(`📝 AssetRegistered ${asset}`);
    }

    pairCreated(assetLow: AssetId, assetHigh: AssetId): void {
        log.info(`🏊 PairCreated ${assetLow}/${assetHigh}`);
    }

    swapExecuted(event: SwapExecutedEvent): void {
        log.info(
            `💱 Swap by ${event.caller} on ${event.assetLow}/${event.assetHigh}: ` +
            `in ${event.amountLowIn}/${event.amountHighIn} out ${event.amountLowOut}/${event.amountHighOut}`
        );
    }
}

export class CompositeEventSink implements EventSink {
    constructor(private readonly sinks: EventSink[]) {}

    assetRegistered(asset: AssetId): void {
        for (const sink of this.sinks) sink.assetRegistered(asset);
    }

    pairCreated(assetLow: AssetId, assetHigh: AssetId): void {
        for (const sink of this.sinks) sink.pairCreated(assetLow, assetHigh);
    }

    swapExecuted(event: SwapExecutedEvent): void {
        for (const sink of this.sinks) sink.swapExecuted(event);
    }
}
