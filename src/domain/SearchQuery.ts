/** Qualifiers are rendered in this order. */
export const SEARCH_FILTER_NAMES = [
    'language',
    'stars',
    'forks',
    'fork',
    'created',
    'pushed',
    'size',
    'author',
    'organization',
    'topics',
] as const;

export type SearchFilterName = (typeof SEARCH_FILTER_NAMES)[number];

/** Search qualifier each recognised filter renders to. */
export const SEARCH_QUALIFIERS: Readonly<Record<SearchFilterName, string>> = {
    language: 'language',
    stars: 'stars',
    forks: 'forks',
    fork: 'fork',
    created: 'created',
    pushed: 'pushed',
    size: 'size',
    author: 'user',
    organization: 'org',
    topics: 'topic',
};

export type SearchFilterValue = string | number | boolean | readonly string[];

export type SearchFilters = Partial<Record<SearchFilterName, SearchFilterValue>>;

export type SearchSort = 'stars' | 'forks' | 'help-wanted-issues' | 'updated' | 'best-match';

export type SearchOrder = 'asc' | 'desc';

export interface SearchRequest {
    query: string;
    sort: SearchSort;
    order: SearchOrder;
    perPage: number;
    maxResults: number;
}

function renderTerm(value: string): string {
    return /\s/.test(value) ? `"${value}"` : value;
}

function renderFilter(qualifier: string, value: SearchFilterValue): string[] {
    const values: readonly string[] = typeof value === 'object' ? value : [String(value)];
    return values
        .filter(item => item.length > 0)
        .map(item => `${qualifier}:${renderTerm(item)}`);
}

export function buildSearchQuery(filters: SearchFilters, keywords: readonly string[] = []): string {
    const terms = keywords.filter(keyword => keyword.length > 0).map(renderTerm);

    for (const name of SEARCH_FILTER_NAMES) {
        const value = filters[name];
        if (value === undefined) continue;
        terms.push(...renderFilter(SEARCH_QUALIFIERS[name], value));
    }

    return terms.join(' ');
}
