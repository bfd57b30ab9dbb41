import type { PullRequest, PullRequestSnapshot } from '@pr-radar/shared-types';

// A PR counts as approved with this many distinct approvers, or once the acting user approved it
export const APPROVALS_REQUIRED = 2;

export function isApproved(pr: PullRequest, user: string): boolean {
    return pr.approvers.size >= APPROVALS_REQUIRED || pr.approvers.has(user);
}

// Newest first, then the user's own PRs pinned ahead of everyone else's
export function orderPullRequests(prs: readonly PullRequest[], user: string): PullRequest[] {
    const ordered = [...prs];
    ordered.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    ordered.sort((a, b) => ownershipRank(a, user) - ownershipRank(b, user));
    return ordered;
}

function ownershipRank(pr: PullRequest, user: string): number {
    return pr.createdBy === user ? 0 : 1;
}

// Drop drafts, order, then split off approved PRs keeping their relative order
export function processPullRequests(records: readonly PullRequest[], user: string): PullRequestSnapshot {
    const ready = records.filter((pr) => !pr.isDraft);
    const ordered = orderPullRequests(ready, user);

    const open: PullRequest[] = [];
    const approved: PullRequest[] = [];
    for (const pr of ordered) {
        (isApproved(pr, user) ? approved : open).push(pr);
    }

    return { open, approved };
}
