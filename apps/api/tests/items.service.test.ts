import { describe, expect, it } from 'vitest';
import type { PullRequestSnapshot } from '@pr-radar/shared-types';
import { FetchError } from '../src/errors/fetch.error.js';
import { PullRequestController } from '../src/services/items.service.js';
import { BASE_TIME, makePullRequest } from './fixtures.js';

const A = makePullRequest({ url: 'https://gh/a', createdBy: 'alice', createdAt: BASE_TIME, repository: 'api', title: 'Add login' });
const B = makePullRequest({ url: 'https://gh/b', createdBy: 'bob', createdAt: BASE_TIME, repository: 'web', title: 'Fix header' });
const C = makePullRequest({ url: 'https://gh/c', createdBy: 'alice', createdAt: BASE_TIME, repository: 'api', title: 'Cache tokens' });
const D = makePullRequest({ url: 'https://gh/d', createdBy: 'dan', createdAt: BASE_TIME, repository: 'docs', title: 'Update guide' });

function controllerFor(snapshot: PullRequestSnapshot): PullRequestController {
    return new PullRequestController({ get: async () => snapshot }, 'alice');
}

function failingController(error: Error): PullRequestController {
    return new PullRequestController(
        {
            get: async () => {
                throw error;
            },
        },
        'alice'
    );
}

const snapshot: PullRequestSnapshot = { open: [A, B], approved: [C, D] };

describe('PullRequestController.buildItems', () => {
    it('maps open PRs to items in order', async () => {
        const items = await controllerFor(snapshot).buildItems('open');

        expect(items).toEqual([
            {
                title: 'Add login',
                subtitle: 'api\nhttps://gh/a',
                iconVariant: 'own',
                primaryAction: { kind: 'open', urls: ['https://gh/a'] },
                secondaryAction: { kind: 'emit', event: { type: 'multiselect', prType: 'open', prUrl: 'https://gh/a' } },
            },
            {
                title: 'Fix header',
                subtitle: 'web\nhttps://gh/b',
                iconVariant: 'normal',
                primaryAction: { kind: 'open', urls: ['https://gh/b'] },
                secondaryAction: { kind: 'emit', event: { type: 'multiselect', prType: 'open', prUrl: 'https://gh/b' } },
            },
        ]);
    });

    it('uses the approved icons for the approved view', async () => {
        const items = await controllerFor(snapshot).buildItems('approved');

        expect(items.map((item) => [item.title, item.iconVariant])).toEqual([
            ['Cache tokens', 'own-approved'],
            ['Update guide', 'approved'],
        ]);
        expect(items[1].secondaryAction).toEqual({
            kind: 'emit',
            event: { type: 'multiselect', prType: 'approved', prUrl: 'https://gh/d' },
        });
    });

    it('applies the predicate without reordering', async () => {
        const items = await controllerFor(snapshot).buildItems('open', (pr) => pr.repository === 'web');

        expect(items.map((item) => item.title)).toEqual(['Fix header']);
    });

    it('appends the approved button when asked and approvals exist', async () => {
        const items = await controllerFor(snapshot).buildItems('open', undefined, true);

        expect(items).toHaveLength(3);
        expect(items[2]).toEqual({
            title: 'Approved Pull Requests',
            subtitle: 'View 2 approved Pull Requests',
            iconVariant: 'approved',
            primaryAction: { kind: 'emit', event: { type: 'approved-prs' } },
        });
    });

    it('counts all approved PRs in the button even when the predicate hides open ones', async () => {
        const items = await controllerFor(snapshot).buildItems('open', () => false, true);

        expect(items.map((item) => item.subtitle)).toEqual(['View 2 approved Pull Requests']);
    });

    it('omits the button without approved PRs', async () => {
        const items = await controllerFor({ open: [A], approved: [] }).buildItems('open', undefined, true);

        expect(items.map((item) => item.title)).toEqual(['Add login']);
    });

    it('renders a fetch failure as a single error item', async () => {
        const items = await failingController(new FetchError()).buildItems('open', undefined, true);

        expect(items).toEqual([
            {
                title: 'Error getting Pull Requests',
                subtitle: 'Check your connectivity, GitHub URL and access token',
                iconVariant: 'error',
                primaryAction: { kind: 'none' },
            },
        ]);
    });

    it('rethrows errors that are not fetch failures', async () => {
        await expect(failingController(new TypeError('bug')).buildItems('open')).rejects.toThrow('bug');
    });
});

describe('PullRequestController.handleEvent', () => {
    it('lists approved PRs for the approved button', async () => {
        const controller = controllerFor(snapshot);

        expect(await controller.handleEvent({ type: 'approved-prs' })).toEqual(await controller.buildItems('approved'));
    });

    it('collects multiselected URLs and hides them from the list', async () => {
        const items = await controllerFor(snapshot).handleEvent(
            { type: 'multiselect', prType: 'approved', prUrl: 'https://gh/d' },
            ['https://gh/c']
        );

        expect(items).toEqual([
            {
                title: 'Open 2 Pull Requests',
                subtitle: 'Do not write a query if you want to open multiple Pull Requests!',
                iconVariant: 'approved',
                primaryAction: { kind: 'open', urls: ['https://gh/c', 'https://gh/d'] },
            },
        ]);
    });

    it('counts a URL selected twice once', async () => {
        const items = await controllerFor(snapshot).handleEvent(
            { type: 'multiselect', prType: 'open', prUrl: 'https://gh/b' },
            ['https://gh/b']
        );

        expect(items.map((item) => item.title)).toEqual(['Open 1 Pull Requests', 'Add login']);
        expect(items[0].primaryAction).toEqual({ kind: 'open', urls: ['https://gh/b'] });
    });

    it('shows only the error item when the snapshot cannot be loaded', async () => {
        const items = await failingController(new FetchError()).handleEvent({
            type: 'multiselect',
            prType: 'open',
            prUrl: 'https://gh/a',
        });

        expect(items.map((item) => item.iconVariant)).toEqual(['error']);
    });
});
