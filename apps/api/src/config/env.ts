import path from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export interface AppConfig {
    hostname: string;
    organization: string;
    accessToken: string;
    userLogin: string;
    requestTimeoutMs: number;
    maxConcurrentRequests: number;
    cacheTtlMs: number;
    port: number;
    frontendUrl: string;
}

const EnvSchema = z.object({
    GITHUB_HOSTNAME: z.string().min(1),
    GITHUB_ORG: z.string().min(1),
    GITHUB_ACCESS_TOKEN: z.string().min(1),
    GITHUB_USER: z.string().min(1),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    MAX_CONCURRENT_REQUESTS: z.coerce.number().int().positive().default(8),
    CACHE_TTL_MS: z.coerce.number().int().positive().default(60_000),
    PORT: z.coerce.number().int().positive().default(5000),
    FRONTEND_URL: z.string().min(1).default('http://localhost:3000'),
});

// Load apps/api/.env.local into process.env (existing variables win)
export function loadEnvFile(): void {
    dotenv.config({ path: path.resolve(__dirname, '../../.env.local') });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${issues}`);
    }

    const vars = parsed.data;
    return {
        hostname: vars.GITHUB_HOSTNAME,
        organization: vars.GITHUB_ORG,
        accessToken: vars.GITHUB_ACCESS_TOKEN,
        userLogin: vars.GITHUB_USER,
        requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
        maxConcurrentRequests: vars.MAX_CONCURRENT_REQUESTS,
        cacheTtlMs: vars.CACHE_TTL_MS,
        port: vars.PORT,
        frontendUrl: vars.FRONTEND_URL,
    };
}
