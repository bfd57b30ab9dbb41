import { Router, Request, Response } from 'express';

// Read-only view of the pull request cache
export interface CacheStatus {
    readonly lastFetchedAt: number | null;
    isFresh(): boolean;
}

export function describeCache(status: CacheStatus): string {
    if (status.lastFetchedAt === null) {
        return 'Pull requests not fetched yet.';
    }
    const fetchedAt = new Date(status.lastFetchedAt).toISOString();
    return `Pull requests fetched at ${fetchedAt} (${status.isFresh() ? 'fresh' : 'stale'}).`;
}

export function createIndexRouter(status: CacheStatus): Router {
    const router = Router();

    router.get('/', (_req: Request, res: Response) => {
        res.send(`PR Radar API is running. ${describeCache(status)}`);
    });

    return router;
}
