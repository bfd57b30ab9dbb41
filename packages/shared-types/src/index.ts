export type { PullRequest, PullRequestSnapshot, PrType } from './github.types.js';
export type { ItemEvent, ItemAction, IconVariant, DisplayItem, ItemsResponse } from './items.types.js';
