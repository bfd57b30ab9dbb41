import type { PullRequest } from '@pr-radar/shared-types';
import { GITHUB_DATE_PATTERN, type GitHubPull } from '../schemas/github.schemas.js';

// Date.parse rolls impossible dates over (Feb 30 -> Mar 1, T24:00 -> next day); reject those
export function parseGitHubDate(value: string): Date {
    const timestamp = GITHUB_DATE_PATTERN.test(value) ? Date.parse(value) : Number.NaN;
    if (Number.isNaN(timestamp)) {
        throw new Error(`Invalid GitHub timestamp: ${value}`);
    }
    const date = new Date(timestamp);
    if (`${date.toISOString().slice(0, 19)}Z` !== value) {
        throw new Error(`Invalid GitHub timestamp: ${value}`);
    }
    return date;
}

export function buildPullRequest(pull: GitHubPull, approvers: Iterable<string>): PullRequest {
    return Object.freeze({
        repository: pull.head.repo.name,
        title: pull.title,
        url: pull.html_url,
        isDraft: pull.draft,
        createdBy: pull.user.login,
        createdAt: parseGitHubDate(pull.created_at),
        approvers: new Set(approvers),
    });
}
