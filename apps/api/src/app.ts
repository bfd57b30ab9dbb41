import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { type CacheStatus, createIndexRouter } from './routes/index.js';
import { createPrsRouter } from './routes/prs.routes.js';
import type { PullRequestController } from './services/items.service.js';

export interface AppOptions {
    controller: PullRequestController;
    cacheStatus: CacheStatus;
    corsOrigin: string;
}

function statusOf(error: unknown): number {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return 500;
}

export function createApp({ controller, cacheStatus, corsOrigin }: AppOptions): Express {
    const app = express();

    app.use(cors({ origin: corsOrigin }));
    app.use(express.json());

    // Mount routes
    app.use('/', createIndexRouter(cacheStatus));
    app.use('/api/prs', createPrsRouter(controller));

    // Body parser failures and anything a route let through
    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        const status = statusOf(error);
        if (status >= 500) {
            console.error('[APP] Unhandled error:', error);
        }
        res.status(status).json({ error: status >= 500 ? 'Internal server error' : 'Bad request' });
    });

    return app;
}
