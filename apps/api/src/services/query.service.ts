import type { PullRequest } from '@pr-radar/shared-types';

// Longest query accepted over HTTP
export const MAX_QUERY_LENGTH = 100;

export type PullRequestPredicate = (pr: PullRequest) => boolean;

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Queries are regular expressions; anything that fails to compile is searched for literally
export function compileQuery(pattern: string): RegExp {
    try {
        return new RegExp(pattern, 'i');
    } catch {
        return new RegExp(escapeRegExp(pattern), 'i');
    }
}

export function createQueryPredicate(pattern: string): PullRequestPredicate {
    const query = pattern.trim();
    if (query === '') {
        return () => true;
    }

    const matcher = compileQuery(query);
    return (pr) => matcher.test(pr.title) || matcher.test(pr.repository);
}

export function filterPullRequests(prs: readonly PullRequest[], pattern: string): PullRequest[] {
    return prs.filter(createQueryPredicate(pattern));
}
