import type { PullRequest } from '@pr-radar/shared-types';
import { FetchError } from '../errors/fetch.error.js';
import {
    type GitHubRepository,
    PullListSchema,
    RepositoryListSchema,
    ReviewListSchema,
} from '../schemas/github.schemas.js';
import { fanOut } from '../utils/fanout.js';
import { type GitHubApi, logGitHubError } from './github.service.js';
import { buildPullRequest } from './pull-request.builder.js';

// Logins of everyone who left an APPROVED review; repeat approvals count once
export async function fetchApprovers(api: GitHubApi, pullApiUrl: string, signal?: AbortSignal): Promise<Set<string>> {
    const reviews = await api.get(`${pullApiUrl}/reviews`, ReviewListSchema, signal);
    return new Set(reviews.filter((review) => review.state === 'APPROVED').map((review) => review.user.login));
}

export async function fetchRepositoryPulls(api: GitHubApi, repoApiUrl: string, signal?: AbortSignal): Promise<PullRequest[]> {
    const pulls = await api.get(`${repoApiUrl}/pulls`, PullListSchema, signal);

    const built = await fanOut(
        pulls,
        async (pull, childSignal) => buildPullRequest(pull, await fetchApprovers(api, pull.url, childSignal)),
        signal
    );

    return mergeByUrl(built);
}

function mergeByUrl(pullRequests: Iterable<PullRequest>): PullRequest[] {
    const byUrl = new Map<string, PullRequest>();
    for (const pr of pullRequests) {
        byUrl.set(pr.url, pr);
    }
    return Array.from(byUrl.values());
}

/**
 * Lists every open pull request of an organization.
 *
 * The repository list is fetched once and reused for the lifetime of the
 * fetcher. Any failure below it rejects the whole call with a FetchError.
 */
export class OrganizationFetcher {
    private repositories: GitHubRepository[] | null = null;

    constructor(
        private readonly api: GitHubApi,
        private readonly reposUrl: string
    ) {}

    async fetchAll(signal?: AbortSignal): Promise<PullRequest[]> {
        try {
            const repositories = await this.getRepositories(signal);
            console.log(`[GITHUB] Fetching pull requests for ${repositories.length} repositories...`);

            const perRepository = await fanOut(
                repositories,
                (repository, childSignal) => fetchRepositoryPulls(this.api, repository.url, childSignal),
                signal
            );

            const pullRequests = mergeByUrl(perRepository.flat());
            console.log(`[GITHUB] Fetched ${pullRequests.length} pull requests.`);
            return pullRequests;
        } catch (error) {
            logGitHubError('Failed to fetch pull requests', error);
            throw new FetchError(undefined, undefined, { cause: error });
        }
    }

    private async getRepositories(signal?: AbortSignal): Promise<GitHubRepository[]> {
        if (this.repositories === null) {
            this.repositories = await this.api.get(this.reposUrl, RepositoryListSchema, signal);
        }
        return this.repositories;
    }
}
