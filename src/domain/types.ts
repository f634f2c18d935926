export interface RepositoryIdentifier {
    readonly owner: string;
    readonly name: string;
}

export interface RepositoryMetadata {
    readonly name: string;
    readonly owner: string;
    readonly fullName: string;
    readonly description: string | null;
    readonly url: string;
    readonly stars: number;
    readonly watchers: number;
    readonly forks: number;
    readonly openIssues: number;
    readonly defaultBranch: string;
}

/** Bytes of code per language, as reported by the languages endpoint. */
export type LanguageBytes = Readonly<Record<string, number>>;

export interface ContributorsPage {
    readonly count: number;
    readonly hasNextPage: boolean;
}

/**
 * Decoded value for each sub-resource. Labels, commits and pulls are totals.
 */
export interface ResourceValues {
    metadata: RepositoryMetadata;
    languages: LanguageBytes;
    contributors: ContributorsPage;
    readme: string;
    topics: readonly string[];
    labels: number;
    commits: number;
    pulls: number;
}

export type ResourceKind = keyof ResourceValues;

export interface Available<T> {
    readonly available: true;
    readonly value: T;
}

export interface Unavailable {
    readonly available: false;
    readonly reason?: string;
    readonly rateLimited?: boolean;
}

export type Result<T> = Available<T> | Unavailable;

export type SubResourceResult<K extends ResourceKind> = { readonly kind: K } & Result<ResourceValues[K]>;

export interface PageRequest {
    readonly page?: number;
    readonly perPage?: number;
}

export interface ContributorCount {
    readonly count: number;
    /** When true, `count` is an extrapolation, not an exact total. */
    readonly estimated: boolean;
}

export interface LanguageShare {
    readonly language: string;
    readonly bytes: number;
    readonly percentage: number;
}

export interface LanguageBreakdown {
    readonly total_bytes: number;
    readonly languages: readonly LanguageShare[];
    readonly description: string;
}

export function describeIdentifier(identifier: RepositoryIdentifier): string {
    return `${identifier.owner}/${identifier.name}`;
}
