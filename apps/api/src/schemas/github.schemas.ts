import { z } from 'zod';

// created_at as returned by the REST API, always UTC with second precision
export const GITHUB_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

const GitHubLoginSchema = z.object({
    login: z.string(),
});

export const RepositorySchema = z.object({
    name: z.string(),
    url: z.string().url(),
});

export const PullSchema = z.object({
    title: z.string(),
    html_url: z.string().url(),
    draft: z.boolean(),
    user: GitHubLoginSchema,
    created_at: z.string().regex(GITHUB_DATE_PATTERN),
    head: z.object({
        repo: z.object({
            name: z.string(),
        }),
    }),
    url: z.string().url(), // API URL, base for /reviews
});

export const ReviewSchema = z.object({
    state: z.string(),
    user: GitHubLoginSchema,
});

export const RepositoryListSchema = z.array(RepositorySchema);
export const PullListSchema = z.array(PullSchema);
export const ReviewListSchema = z.array(ReviewSchema);

export type GitHubRepository = z.infer<typeof RepositorySchema>;
export type GitHubPull = z.infer<typeof PullSchema>;
export type GitHubReview = z.infer<typeof ReviewSchema>;
