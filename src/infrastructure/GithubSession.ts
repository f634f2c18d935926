export const DEFAULT_API_URL = 'https://api.github.com';
const API_VERSION = '2022-11-28';
const USER_AGENT = 'repo-metadata-collector';

/**
 * Read-only request context shared by every fetch in a run.
 */
export interface GithubSession {
    readonly baseUrl: string;
    readonly headers: Readonly<Record<string, string>>;
}

export function createGithubSession(args: { token?: string; baseUrl?: string }): GithubSession {
    const headers: Record<string, string> = {
        'User-Agent': USER_AGENT,
        'X-GitHub-Api-Version': API_VERSION,
    };
    const token = args.token?.trim();
    if (token) {
        headers.Authorization = `Bearer ${token}`;
    }

    return Object.freeze({
        baseUrl: (args.baseUrl ?? DEFAULT_API_URL).replace(/\/+$/, ''),
        headers: Object.freeze(headers),
    });
}
