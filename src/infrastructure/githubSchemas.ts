import { z } from 'zod';

const count = z.number().int().nonnegative();

export const repositorySchema = z.object({
    name: z.string(),
    full_name: z.string(),
    owner: z.object({ login: z.string() }),
    html_url: z.string(),
    description: z.string().nullable(),
    stargazers_count: count,
    watchers_count: count,
    forks_count: count,
    open_issues_count: count,
    default_branch: z.string(),
});

export const languagesSchema = z.record(count);

export const topicsSchema = z.object({
    names: z.array(z.string()),
});

/** Any list endpoint; only the length matters. */
export const listSchema = z.array(z.unknown());

export const searchResponseSchema = z.object({
    total_count: count,
    items: z.array(
        z.object({
            name: z.string(),
            owner: z.object({ login: z.string() }),
        })
    ),
});
