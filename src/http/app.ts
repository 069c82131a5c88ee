import express, { Request, Response } from 'express';
import { EventMonitor } from '@/services/eventMonitor.service';
import { config } from '@/config';
import logger, { describeError } from '@/utils/pinoLogger';

export interface HttpAppDeps {
    monitor : EventMonitor;
    connectionCount : () => number;
}

/**
 * Plain HTTP surface next to the socket server: liveness and a JSON view
 * of the event backbone.
 */
export function createHttpApp({ monitor, connectionCount } : HttpAppDeps) : express.Express {
    const app = express();
    app.disable('x-powered-by');

    app.get('/health', (_req : Request, res : Response) => {
        res.status(200).json({ status : 'ok', service : config.SERVICE_NAME, pod : config.PODNAME });
    });

    app.get('/metrics', async (_req : Request, res : Response) => {
        try {
            const metrics = await monitor.collect();
            res.status(200).json({ ...metrics, connections : connectionCount() });
        } catch (error) {
            logger.error('Failed to collect event metrics', describeError(error));
            res.status(503).json({ error : 'metrics unavailable' });
        }
    });

    return app;
}
