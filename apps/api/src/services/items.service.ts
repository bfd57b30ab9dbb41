import type {
    DisplayItem,
    IconVariant,
    ItemEvent,
    PrType,
    PullRequest,
    PullRequestSnapshot,
} from '@pr-radar/shared-types';
import { FetchError } from '../errors/fetch.error.js';
import type { PullRequestPredicate } from './query.service.js';

export interface SnapshotSource {
    get(): Promise<PullRequestSnapshot>;
}

export const APPROVED_BUTTON_TITLE = 'Approved Pull Requests';
export const MULTISELECT_WARNING = 'Do not write a query if you want to open multiple Pull Requests!';

function iconFor(prType: PrType, own: boolean): IconVariant {
    if (prType === 'approved') {
        return own ? 'own-approved' : 'approved';
    }
    return own ? 'own' : 'normal';
}

function errorItem(error: FetchError): DisplayItem {
    return {
        title: error.title,
        subtitle: error.description,
        iconVariant: 'error',
        primaryAction: { kind: 'none' },
    };
}

/**
 * Turns the cached pull request snapshot into display items for a client.
 */
export class PullRequestController {
    constructor(
        private readonly snapshots: SnapshotSource,
        private readonly user: string
    ) {}

    async buildItems(
        prType: PrType,
        predicate?: PullRequestPredicate,
        includeApprovedButton = false
    ): Promise<DisplayItem[]> {
        const snapshot = await this.loadSnapshot();
        if (snapshot instanceof FetchError) {
            return [errorItem(snapshot)];
        }
        return this.itemsFrom(snapshot, prType, predicate, includeApprovedButton);
    }

    async handleEvent(event: ItemEvent, selectedUrls: readonly string[] = []): Promise<DisplayItem[]> {
        switch (event.type) {
            case 'approved-prs':
                return this.buildItems('approved');
            case 'multiselect':
                return this.buildMultiselectItems(event.prType, [...selectedUrls, event.prUrl]);
        }
    }

    // "Open N" entry for the collected URLs, followed by the PRs not picked yet
    private async buildMultiselectItems(prType: PrType, urls: readonly string[]): Promise<DisplayItem[]> {
        const snapshot = await this.loadSnapshot();
        if (snapshot instanceof FetchError) {
            return [errorItem(snapshot)];
        }

        const selected = new Set(urls);
        const openSelected: DisplayItem = {
            title: `Open ${selected.size} Pull Requests`,
            subtitle: MULTISELECT_WARNING,
            iconVariant: 'approved',
            primaryAction: { kind: 'open', urls: Array.from(selected) },
        };

        return [openSelected, ...this.itemsFrom(snapshot, prType, (pr) => !selected.has(pr.url), false)];
    }

    private itemsFrom(
        snapshot: PullRequestSnapshot,
        prType: PrType,
        predicate: PullRequestPredicate | undefined,
        includeApprovedButton: boolean
    ): DisplayItem[] {
        const relevant = prType === 'approved' ? snapshot.approved : snapshot.open;
        const items = relevant
            .filter((pr) => predicate === undefined || predicate(pr))
            .map((pr) => this.toItem(pr, prType));

        if (includeApprovedButton && snapshot.approved.length > 0) {
            items.push({
                title: APPROVED_BUTTON_TITLE,
                subtitle: `View ${snapshot.approved.length} approved Pull Requests`,
                iconVariant: 'approved',
                primaryAction: { kind: 'emit', event: { type: 'approved-prs' } },
            });
        }
        return items;
    }

    private toItem(pr: PullRequest, prType: PrType): DisplayItem {
        return {
            title: pr.title,
            subtitle: `${pr.repository}\n${pr.url}`,
            iconVariant: iconFor(prType, pr.createdBy === this.user),
            primaryAction: { kind: 'open', urls: [pr.url] },
            secondaryAction: { kind: 'emit', event: { type: 'multiselect', prType, prUrl: pr.url } },
        };
    }

    private async loadSnapshot(): Promise<PullRequestSnapshot | FetchError> {
        try {
            return await this.snapshots.get();
        } catch (error) {
            if (error instanceof FetchError) {
                return error;
            }
            throw error;
        }
    }
}
