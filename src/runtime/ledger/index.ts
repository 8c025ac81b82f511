export type { AccountId, AssetId, TokenLedger } from './TokenLedger.js';
export { TokenBank } from './TokenBank.js';
export type { TokenBankSnapshot, TransferHook, TransferRecord } from './TokenBank.js';
