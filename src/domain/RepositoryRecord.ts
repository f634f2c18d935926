import { formatLanguages } from './languages';
import type {
    ContributorCount,
    LanguageBreakdown,
    LanguageBytes,
    RepositoryIdentifier,
    RepositoryMetadata,
    Result,
} from './types';

export const NOT_AVAILABLE = {
    description: 'description not available',
    readme: 'README not available',
    languages: 'languages not available',
    keywords: 'keywords not available',
    commits: 'commits not available',
    pulls: 'pulls not available',
    labels: 'labels not available',
} as const;

/**
 * Final per-repository shape written to every store. Fields backed by a failed
 * fetch carry a placeholder string instead of being left out.
 */
export interface RepositoryRecord {
    readonly name: string;
    readonly owner: string;
    readonly full_name: string;
    readonly url: string;
    readonly default_branch: string;
    readonly description: string;
    readonly stars: number;
    readonly watchers: number;
    readonly forks: number;
    readonly open_issues: number;
    readonly commits: number | string;
    readonly pulls: number | string;
    readonly labels_count: number | string;
    readonly contributors: ContributorCount;
    readonly languages_info: LanguageBreakdown | string;
    readonly readme: string;
    readonly keywords: readonly string[] | string;
}

export interface RecordParts {
    metadata: RepositoryMetadata;
    contributors: ContributorCount;
    languages: Result<LanguageBytes>;
    readme: Result<string>;
    topics: Result<readonly string[]>;
    labels: Result<number>;
    commits: Result<number>;
    pulls: Result<number>;
}

export type ProcessOutcome =
    | { readonly status: 'included'; readonly record: RepositoryRecord }
    | {
        readonly status: 'excluded';
        readonly identifier: RepositoryIdentifier;
        readonly reason: string;
        readonly observed: number | null;
        readonly threshold: number | null;
    }
    | { readonly status: 'unavailable'; readonly identifier: RepositoryIdentifier; readonly reason: string };

function valueOr<T>(result: Result<T>, placeholder: string): T | string {
    return result.available ? result.value : placeholder;
}

export function shapeRepositoryRecord(parts: RecordParts): RepositoryRecord {
    const { metadata } = parts;
    const breakdown = parts.languages.available ? formatLanguages(parts.languages.value) : null;

    return {
        name: metadata.name,
        owner: metadata.owner,
        full_name: metadata.fullName,
        url: metadata.url,
        default_branch: metadata.defaultBranch,
        description: metadata.description ?? NOT_AVAILABLE.description,
        stars: metadata.stars,
        watchers: metadata.watchers,
        forks: metadata.forks,
        open_issues: metadata.openIssues,
        commits: valueOr(parts.commits, NOT_AVAILABLE.commits),
        pulls: valueOr(parts.pulls, NOT_AVAILABLE.pulls),
        labels_count: valueOr(parts.labels, NOT_AVAILABLE.labels),
        contributors: parts.contributors,
        languages_info: breakdown ?? NOT_AVAILABLE.languages,
        readme: valueOr(parts.readme, NOT_AVAILABLE.readme),
        keywords: valueOr(parts.topics, NOT_AVAILABLE.keywords),
    };
}
