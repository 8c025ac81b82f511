/**
 * Exchange error taxonomy.
 *
 * Every failure aborts the whole call with no state change. Ledger errors
 * are raised by the ledger adapter and reach the caller as the same object.
 */

export type ValidationErrorCode =
    | 'DuplicateAsset'
    | 'InvalidAsset'
    | 'IdenticalAssets'
    | 'AssetNotRegistered'
    | 'PairAlreadyExists'
    | 'PairNotFound'
    | 'InsufficientLiquidity'
    | 'InvalidAssetPair'
    | 'InsufficientInput'
    | 'InsufficientOutput';

export type LedgerErrorCode = 'InsufficientBalance' | 'InsufficientAllowance';

export type ExchangeErrorCode =
    | ValidationErrorCode
    | LedgerErrorCode
    | 'ReentrancyViolation'
    | 'RollbackFailed';

export type ErrorCategory = 'validation' | 'ledger' | 'concurrency' | 'internal';

const categories: Record<ExchangeErrorCode, ErrorCategory> = {
    DuplicateAsset: 'validation',
    InvalidAsset: 'validation',
    IdenticalAssets: 'validation',
    AssetNotRegistered: 'validation',
    PairAlreadyExists: 'validation',
    PairNotFound: 'validation',
    InsufficientLiquidity: 'validation',
    InvalidAssetPair: 'validation',
    InsufficientInput: 'validation',
    InsufficientOutput: 'validation',
    InsufficientBalance: 'ledger',
    InsufficientAllowance: 'ledger',
    ReentrancyViolation: 'concurrency',
    RollbackFailed: 'internal',
};

export class ExchangeError extends Error {
    readonly code: ExchangeErrorCode;
    readonly category: ErrorCategory;

    constructor(code: ExchangeErrorCode, message?: string, options?: { cause?: unknown }) {
        super(message ? `${code}: ${message}` : code, options);
        this.name = 'ExchangeError';
        this.code = code;
        this.category = categories[code];
    }
}
