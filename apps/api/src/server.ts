import { loadConfig, loadEnvFile } from './config/env.js';
import { createApp } from './app.js';
import { TtlCache } from './services/cache.service.js';
import { OrganizationFetcher } from './services/fetch.service.js';
import { GitHubClient, organizationReposUrl } from './services/github.service.js';
import { PullRequestController } from './services/items.service.js';
import { processPullRequests } from './services/pr.service.js';

// Load env variables
loadEnvFile();
const config = loadConfig();

const client = new GitHubClient({
    accessToken: config.accessToken,
    timeoutMs: config.requestTimeoutMs,
    maxConcurrentRequests: config.maxConcurrentRequests,
});
const fetcher = new OrganizationFetcher(client, organizationReposUrl(config.hostname, config.organization));
const snapshots = new TtlCache({
    ttlMs: config.cacheTtlMs,
    load: async () => processPullRequests(await fetcher.fetchAll(), config.userLogin),
});
const controller = new PullRequestController(snapshots, config.userLogin);

const app = createApp({ controller, cacheStatus: snapshots, corsOrigin: config.frontendUrl });

app.listen(config.port, () => {
    console.log(`Server listening on port ${config.port} for ${config.organization}@${config.hostname}`);
});
