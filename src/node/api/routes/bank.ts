/**
 * Bank API Routes (sandbox ledger)
 */

import { Router, Request, Response } from 'express';
import type { ExchangeController } from '../ExchangeController.js';
import { send } from './exchange.js';

export function createBankRoutes(controller: ExchangeController): Router {
    const router = Router();

    router.post('/assets', (req: Request, res: Response) => {
        send(res, () => controller.createBankAsset(req.body));
    });

    // Allowance to the pool account
    router.post('/approve', (req: Request, res: Response) => {
        send(res, () => controller.approve(req.body));
    });

    router.post('/faucet', (req: Request, res: Response) => {
        send(res, () => controller.requestFaucet(req.body));
    });

    router.get('/:asset/:account', (req: Request, res: Response) => {
        send(res, () => controller.balance(req.params.asset, req.params.account));
    });

    return router;
}
