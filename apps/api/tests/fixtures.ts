import type { PullRequest } from '@pr-radar/shared-types';
import type { z } from 'zod';
import type { GitHubApi } from '../src/services/github.service.js';
import type { GitHubPull } from '../src/schemas/github.schemas.js';

export const HOST = 'github.example.com';
export const ORG = 'acme';
export const REPOS_URL = `https://${HOST}/api/v3/orgs/${ORG}/repos`;
export const BASE_TIME = Date.UTC(2024, 0, 10, 12, 0, 0);
export const HOUR = 60 * 60 * 1000;

export function repoApiUrl(repo: string): string {
    return `https://${HOST}/api/v3/repos/${ORG}/${repo}`;
}

export function pullWebUrl(repo: string, number: number): string {
    return `https://${HOST}/${ORG}/${repo}/pull/${number}`;
}

export function pullApiUrl(repo: string, number: number): string {
    return `${repoApiUrl(repo)}/pulls/${number}`;
}

interface RawPullOptions {
    repo: string;
    number: number;
    author: string;
    title?: string;
    createdAt?: string;
    draft?: boolean;
}

export function rawPull(options: RawPullOptions): GitHubPull {
    return {
        title: options.title ?? `${options.repo} change #${options.number}`,
        html_url: pullWebUrl(options.repo, options.number),
        draft: options.draft ?? false,
        user: { login: options.author },
        created_at: options.createdAt ?? '2024-01-10T12:00:00Z',
        head: { repo: { name: options.repo } },
        url: pullApiUrl(options.repo, options.number),
    };
}

export function review(login: string, state = 'APPROVED'): { state: string; user: { login: string } } {
    return { state, user: { login } };
}

interface PullRequestOptions {
    url: string;
    createdBy: string;
    createdAt: number;
    repository?: string;
    title?: string;
    isDraft?: boolean;
    approvers?: string[];
}

export function makePullRequest(options: PullRequestOptions): PullRequest {
    return {
        repository: options.repository ?? 'api',
        title: options.title ?? options.url,
        url: options.url,
        isDraft: options.isDraft ?? false,
        createdBy: options.createdBy,
        createdAt: new Date(options.createdAt),
        approvers: new Set(options.approvers ?? []),
    };
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>((settle) => {
        resolve = settle;
    });
    return { promise, resolve };
}

// In-process stand-in for the GitHub REST API, keyed by absolute URL
export class FakeGitHubApi implements GitHubApi {
    readonly calls: string[] = [];
    private readonly routes = new Map<string, unknown>();

    respond(url: string, payload: unknown): this {
        this.routes.set(url, payload);
        return this;
    }

    fail(url: string, error: Error): this {
        this.routes.set(url, error);
        return this;
    }

    callsTo(url: string): number {
        return this.calls.filter((call) => call === url).length;
    }

    async get<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, signal?: AbortSignal): Promise<T> {
        this.calls.push(url);
        signal?.throwIfAborted();
        if (!this.routes.has(url)) {
            throw new Error(`No route for ${url}`);
        }
        const payload = this.routes.get(url);
        if (payload instanceof Error) {
            throw payload;
        }
        return schema.parse(payload);
    }
}
