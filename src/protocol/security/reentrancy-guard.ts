import { logger } from '../utils/logger.js';
import { ExchangeError } from '../errors/ExchangeError.js';

const log = logger.child('Guard');

/**
 * Keyed non-reentrant lock.
 *
 * Acquisition never blocks: a second entry for a held key is refused, which
 * is exactly what a callback re-entering from inside an external call sees.
 */
export class ReentrancyGuard {
    private held = new Set<string>();

    tryEnter(key: string): boolean {
        if (this.held.has(key)) {
            log.warn(`🔒 Reentrancy blocked for ${key}`);
            return false;
        }
        this.held.add(key);
        return true;
    }

    exit(key: string): void {
        this.held.delete(key);
    }

    isHeld(key: string): boolean {
        return this.held.has(key);
    }

    run<T>(key: string, fn: () => T): T {
        if (!this.tryEnter(key)) {
            throw new ExchangeError('ReentrancyViolation', `${key} is already executing`);
        }
        try {
            return fn();
        } finally {
            this.exit(key);
        }
    }
}
