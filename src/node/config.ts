import { parseLogThreshold } from '../protocol/utils/logger.js';

function readPort(raw: string | undefined, fallback: number): number {
    const port = raw ? parseInt(raw, 10) : fallback;
    if (!Number.isInteger(port) || port <= 0 || port > 65535) {
        throw new Error(`Invalid port: ${raw}`);
    }
    return port;
}

// Node-local settings; exchange economics live in protocol/params
export const config = {
    api: {
        port: readPort(process.env.API_PORT, 3001),
        rateLimit: {
            windowMs: 60000,
            maxRequests: parseInt(process.env.RATE_LIMIT_MAX ?? '100', 10) || 100,
        },
        cors: {
            origin: process.env.CORS_ORIGIN ?? '*',
        },
    },
    storage: {
        dataDir: process.env.DATA_DIR ?? './data',
    },
    faucet: {
        enabled: process.env.FAUCET_ENABLED !== 'false',
        maxAmount: 1_000_000n,
    },
    logLevel: parseLogThreshold(process.env.LOG_LEVEL),
};

export type NodeConfig = typeof config;
