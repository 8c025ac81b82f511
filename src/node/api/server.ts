import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import type { NodeConfig } from '../config.js';
import type { ExchangeContext } from '../context.js';
import { logger } from '../../protocol/utils/logger.js';
import { ExchangeController } from './ExchangeController.js';
import { createExchangeRoutes } from './routes/exchange.js';
import { createBankRoutes } from './routes/bank.js';

const log = logger.child('Server');

export const NODE_VERSION = '1.0.0';

export function createApp(context: ExchangeContext, nodeConfig: NodeConfig): Express {
    const app: Express = express();
    const controller = new ExchangeController(context, nodeConfig.faucet);

    const apiLimiter = rateLimit({
        windowMs: nodeConfig.api.rateLimit.windowMs,
        max: nodeConfig.api.rateLimit.maxRequests,
        standardHeaders: true,
        legacyHeaders: false,
        message: {
            success: false,
            error: 'Too many requests, please try again later.',
        },
    });

    app.set('trust proxy', 1);
    app.use(cors(nodeConfig.api.cors));
    app.use(express.json({ limit: '100kb' }));
    app.use(apiLimiter);

    // Request logging
    app.use((req: Request, _res: Response, next: NextFunction) => {
        log.debug(`${req.method} ${req.path}`);
        if (req.method === 'POST') {
            log.debug(`Body: ${JSON.stringify(req.body)}`);
        }
        next();
    });

    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            success: true,
            data: {
                status: 'healthy',
                version: NODE_VERSION,
                uptime: process.uptime(),
                assets: context.executor.pairs.listAssets().length,
                pairs: context.executor.pairs.listPairs().length,
                timestamp: Date.now(),
            },
        });
    });

    app.use('/api/bank', createBankRoutes(controller));
    app.use('/api', createExchangeRoutes(controller));

    app.use((_req: Request, res: Response) => {
        res.status(404).json({ success: false, error: 'Not found' });
    });

    // Malformed JSON and anything else thrown by middleware
    app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
        log.error(`Request failed: ${err.message}`);
        const status = err instanceof SyntaxError ? 400 : 500;
        res.status(status).json({ success: false, error: status === 400 ? 'Malformed JSON body' : 'Internal error' });
    });

    return app;
}
