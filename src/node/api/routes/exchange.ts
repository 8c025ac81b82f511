/**
 * Exchange API Routes
 *
 * Assets, pairs, quotes and swaps. Amounts travel as decimal strings.
 */

import { Router, Request, Response } from 'express';
import type { ApiReply, ExchangeController } from '../ExchangeController.js';

export function send(res: Response, handler: () => ApiReply): void {
    try {
        const reply = handler();
        res.status(reply.status).json(reply.body);
    } catch (error) {
        res.status(500).json({
            success: false,
            error: error instanceof Error ? error.message : 'Request failed',
        });
    }
}

export function createExchangeRoutes(controller: ExchangeController): Router {
    const router = Router();

    /**
     * GET /api/assets
     * Registered assets
     */
    router.get('/assets', (_req: Request, res: Response) => {
        send(res, () => controller.listAssets());
    });

    /**
     * POST /api/assets
     * Register an asset { asset }
     */
    router.post('/assets', (req: Request, res: Response) => {
        send(res, () => controller.registerAsset(req.body));
    });

    /**
     * GET /api/pairs
     */
    router.get('/pairs', (_req: Request, res: Response) => {
        send(res, () => controller.listPairs());
    });

    /**
     * GET /api/pairs/:assetA/:assetB
     * Same record for either order
     */
    router.get('/pairs/:assetA/:assetB', (req: Request, res: Response) => {
        send(res, () => controller.getPair(req.params.assetA, req.params.assetB));
    });

    /**
     * POST /api/pairs
     * Create and seed a pair { caller, assetA, assetB, amountA, amountB }
     */
    router.post('/pairs', (req: Request, res: Response) => {
        send(res, () => controller.createPair(req.body));
    });

    /**
     * GET /api/quote?assetIn=&assetOut=&amountIn=
     * Swap quote without executing
     */
    router.get('/quote', (req: Request, res: Response) => {
        send(res, () => controller.quote(req.query));
    });

    /**
     * POST /api/swap
     * { caller, assetIn, assetOut, amountIn }
     */
    router.post('/swap', (req: Request, res: Response) => {
        send(res, () => controller.swap(req.body));
    });

    return router;
}
