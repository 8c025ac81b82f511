/**
 * Pool Module Exports
 */

export { SwapExecutor } from './SwapExecutor.js';
export type { SwapExecutorOptions, SwapResult } from './SwapExecutor.js';

export { PairStore, canonicalize } from './PairStore.js';
export type { Pair, CanonicalPair, PairStoreSnapshot, PairStoreView } from './PairStore.js';

export { quoteOutput, quoteWithDetails } from './PricingEngine.js';
export type { QuoteDetails } from './PricingEngine.js';

export { ExchangeError } from '../../protocol/errors/ExchangeError.js';
export type { ExchangeErrorCode, ErrorCategory, LedgerErrorCode, ValidationErrorCode } from '../../protocol/errors/ExchangeError.js';

export { LoggingEventSink, CompositeEventSink } from './events.js';
export type { EventSink, SwapExecutedEvent } from './events.js';
