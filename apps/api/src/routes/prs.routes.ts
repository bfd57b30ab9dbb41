import { Router, Request, Response } from 'express';
import type { ItemsResponse } from '@pr-radar/shared-types';
import { ItemEventRequestSchema } from '../schemas/items.schemas.js';
import type { PullRequestController } from '../services/items.service.js';
import { createQueryPredicate, MAX_QUERY_LENGTH } from '../services/query.service.js';

const FAILURE_MESSAGE = 'Failed to build pull request list';

export function createPrsRouter(controller: PullRequestController): Router {
    const router = Router();

    // Open PRs, optionally filtered by ?q=, plus the approved button
    router.get('/', async (req: Request, res: Response) => {
        const query = typeof req.query.q === 'string' ? req.query.q : '';
        if (query.length > MAX_QUERY_LENGTH) {
            res.status(400).json({ error: `Query is longer than ${MAX_QUERY_LENGTH} characters` });
            return;
        }

        try {
            const predicate = query.trim() ? createQueryPredicate(query) : undefined;
            const body: ItemsResponse = { items: await controller.buildItems('open', predicate, true) };
            res.status(200).json(body);
        } catch (error) {
            console.error('[PRS ROUTE] Failed to build open PR list:', error);
            res.status(500).json({ error: FAILURE_MESSAGE });
        }
    });

    router.get('/approved', async (_req: Request, res: Response) => {
        try {
            const body: ItemsResponse = { items: await controller.buildItems('approved') };
            res.status(200).json(body);
        } catch (error) {
            console.error('[PRS ROUTE] Failed to build approved PR list:', error);
            res.status(500).json({ error: FAILURE_MESSAGE });
        }
    });

    // Secondary actions (multiselect, approved button) post their event here
    router.post('/events', async (req: Request, res: Response) => {
        const parsed = ItemEventRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            console.log('[PRS ROUTE] Rejected event body:', parsed.error.issues);
            res.status(400).json({ error: 'Invalid event' });
            return;
        }

        try {
            const { event, selectedUrls } = parsed.data;
            const body: ItemsResponse = { items: await controller.handleEvent(event, selectedUrls) };
            res.status(200).json(body);
        } catch (error) {
            console.error('[PRS ROUTE] Failed to handle event:', error);
            res.status(500).json({ error: FAILURE_MESSAGE });
        }
    });

    return router;
}
