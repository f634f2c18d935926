import type { SearchFilters, SearchOrder, SearchSort } from './SearchQuery';

/** Everything one collection run needs to know, independent of where it was configured. */
export interface CollectionPlan {
    filters: SearchFilters;
    keywords: readonly string[];
    sort: SearchSort;
    order: SearchOrder;
    perPage: number;
    maxResults: number;
    minContributors: number;
    /** Worker count; the collector picks a host default when absent. */
    concurrency?: number;
}
