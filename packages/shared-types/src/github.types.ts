export interface PullRequest {
    readonly repository: string; // Display name of the head repository
    readonly title: string;
    readonly url: string; // Web URL, unique per fetch cycle
    readonly isDraft: boolean;
    readonly createdBy: string; // Author login
    readonly createdAt: Date; // UTC
    readonly approvers: ReadonlySet<string>; // Logins with an APPROVED review
}

export interface PullRequestSnapshot {
    readonly open: readonly PullRequest[];
    readonly approved: readonly PullRequest[];
}

export type PrType = 'open' | 'approved';
