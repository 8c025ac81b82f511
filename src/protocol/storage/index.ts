export { Storage, STATE_FILE, isExchangeState, isPairStoreSnapshot, isTokenBankSnapshot } from './Storage.js';
export type { ExchangeState } from './Storage.js';
