export const FETCH_ERROR_TITLE = 'Error getting Pull Requests';
export const FETCH_ERROR_DESCRIPTION = 'Check your connectivity, GitHub URL and access token';

// Raised for any failure while aggregating pull requests; the cause is kept for logs only
export class FetchError extends Error {
    readonly title: string;
    readonly description: string;

    constructor(
        title: string = FETCH_ERROR_TITLE,
        description: string = FETCH_ERROR_DESCRIPTION,
        options?: ErrorOptions
    ) {
        super(`${title}: ${description}`, options);
        this.name = 'FetchError';
        this.title = title;
        this.description = description;
    }
}
