import type { Server } from 'http';
import { config } from '../../config.js';
import { createExchangeContext } from '../../context.js';
import { createApp } from '../../api/server.js';
import { Storage } from '../../../protocol/storage/index.js';
import { logger } from '../../../protocol/utils/logger.js';
import cli, { c } from '../../../protocol/utils/cli.js';

export interface NodeOptions {
    apiPort: number;
    dataDir: string;
    persist: boolean;
}

export async function startNode(options: NodeOptions): Promise<Server> {
    logger.setLevel(config.logLevel);

    const storage = options.persist ? new Storage(options.dataDir) : null;
    const context = createExchangeContext({ storage });
    const app = createApp(context, config);

    const server = await new Promise<Server>((resolve, reject) => {
        const listening = app.listen(options.apiPort, () => resolve(listening));
        listening.once('error', reject);
    });

    console.log(cli.header('Node'));
    console.log(cli.box(cli.keyValues([
        ['API', c.primary(`http://localhost:${options.apiPort}`)],
        ['Data', options.persist ? options.dataDir : 'in-memory'],
        ['Fee', `${context.executor.fee.numerator}/${context.executor.fee.denominator}`],
        ['Pool account', context.executor.poolAccount],
        ['Pairs', String(context.executor.pairs.listPairs().length)],
    ])));

    const shutdown = (): void => {
        logger.info('🛑 Shutting down...');
        context.persist();
        server.close(() => process.exit(0));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    return server;
}
