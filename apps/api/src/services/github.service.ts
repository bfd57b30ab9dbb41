import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { RequestLimiter } from '../utils/limiter.js';

export const GITHUB_API_VERSION = '2022-11-28';

// Read-only access to the GitHub REST API; every payload is validated by the caller's schema
export interface GitHubApi {
    get<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, signal?: AbortSignal): Promise<T>;
}

export interface GitHubClientOptions {
    accessToken: string;
    timeoutMs: number;
    maxConcurrentRequests: number;
    adapter?: AxiosAdapter; // Swapped in by tests
}

export function organizationReposUrl(hostname: string, organization: string): string {
    return `https://${hostname}/api/v3/orgs/${encodeURIComponent(organization)}/repos`;
}

export class GitHubClient implements GitHubApi {
    private readonly http: AxiosInstance;
    private readonly limiter: RequestLimiter;

    constructor(options: GitHubClientOptions) {
        this.http = axios.create({
            timeout: options.timeoutMs,
            adapter: options.adapter,
            headers: {
                'Accept': 'application/vnd.github+json',
                'Authorization': `Bearer ${options.accessToken}`,
                'X-GitHub-Api-Version': GITHUB_API_VERSION,
            },
        });
        this.limiter = new RequestLimiter(options.maxConcurrentRequests);
    }

    async get<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, signal?: AbortSignal): Promise<T> {
        const response = await this.limiter.run(() => this.http.get<unknown>(url, { signal }), signal);
        return schema.parse(response.data);
    }
}

// Log a failed GitHub call without leaking request headers
export function logGitHubError(context: string, error: unknown): void {
    if (axios.isAxiosError(error)) {
        console.error(`[GITHUB] ${context}: ${error.message}`, error.response?.status, error.response?.data);
    } else if (error instanceof z.ZodError) {
        console.error(`[GITHUB] ${context}: unexpected payload`, error.issues);
    } else {
        console.error(`[GITHUB] ${context}:`, error);
    }
}
