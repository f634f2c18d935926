import { readFile } from 'fs/promises';
import { z } from 'zod';
import { describeError } from '../domain/errors';
import type { Logger } from '../domain/Logger';
import type { CollectionPlan } from '../domain/CollectionPlan';
import type { SearchFilters } from '../domain/SearchQuery';
import { DEFAULT_API_URL } from './GithubSession';

const qualifierValue = z.union([z.string().trim().min(1), z.number()]).transform(String);
const positiveInt = z.number().int().positive();

export const configSchema = z
    .object({
        language: z.string().trim().min(1).default('python'),
        stars: qualifierValue.default('>=500'),
        forks: qualifierValue.optional(),
        fork: z.union([z.boolean(), z.literal('only')]).optional(),
        created: qualifierValue.optional(),
        pushed: qualifierValue.optional(),
        size: qualifierValue.optional(),
        author: z.string().trim().min(1).optional(),
        organization: z.string().trim().min(1).optional(),
        topics: z.array(z.string().trim().min(1)).default([]),
        keywords: z.array(z.string().trim().min(1)).default([]),
        sort: z.enum(['stars', 'forks', 'help-wanted-issues', 'updated', 'best-match']).default('stars'),
        order: z.enum(['asc', 'desc']).default('desc'),
        per_page: positiveInt.max(100).default(5),
        max_results: positiveInt.optional(),
        min_contributors: z.number().int().nonnegative().default(1),
        threads: positiveInt.optional(),
        concurrency: positiveInt.optional(),
        output: z.string().trim().min(1).default('output.json'),
        contributors: z
            .object({
                per_page: positiveInt.max(100).default(100),
                max_pages: positiveInt.default(10),
                estimation_threshold: z.number().int().nonnegative().default(500),
            })
            .strict()
            .default({}),
    })
    .strict()
    .superRefine((config, context) => {
        if (config.threads !== undefined && config.concurrency !== undefined) {
            context.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['concurrency'],
                message: 'concurrency is an alias of threads; set only one',
            });
        }
    })
    .transform(({ concurrency, ...config }) => ({ ...config, threads: config.threads ?? concurrency }));

export type Config = z.infer<typeof configSchema>;

// `KEY=` in a .env file arrives as an empty string; treat it as unset.
const unsetIfEmpty = (value: unknown) => (value === '' ? undefined : value);
const optionalSetting = z.preprocess(unsetIfEmpty, z.string().trim().min(1).optional());

export const environmentSchema = z.object({
    GITHUB_TOKEN: optionalSetting,
    GITHUB_API_URL: z.preprocess(unsetIfEmpty, z.string().url().default(DEFAULT_API_URL)),
    PG_CONNECTION_STRING: optionalSetting,
    CONFIG_PATH: z.preprocess(unsetIfEmpty, z.string().trim().min(1).default('configs.json')),
});

export type Environment = z.infer<typeof environmentSchema>;

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

function searchFiltersOf(config: Config): SearchFilters {
    return {
        language: config.language,
        stars: config.stars,
        forks: config.forks,
        fork: config.fork,
        created: config.created,
        pushed: config.pushed,
        size: config.size,
        author: config.author,
        organization: config.organization,
        topics: config.topics,
    };
}

export function collectionPlanOf(config: Config): CollectionPlan {
    return {
        filters: searchFiltersOf(config),
        keywords: config.keywords,
        sort: config.sort,
        order: config.order,
        perPage: config.per_page,
        maxResults: config.max_results ?? config.per_page,
        minContributors: config.min_contributors,
        concurrency: config.threads,
    };
}

export function parseConfig(raw: unknown, logger: Logger): Config | null {
    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
        logger.error(`Invalid configuration: ${formatIssues(parsed.error)}`);
        return null;
    }
    return parsed.data;
}

/**
 * Reads and validates the JSON configuration file.
 * Returns null (after logging why) when it cannot be used.
 */
export async function loadConfig(configPath: string, logger: Logger): Promise<Config | null> {
    let text: string;
    try {
        text = await readFile(configPath, 'utf8');
    } catch (error) {
        logger.error(`Configuration file ${configPath} could not be read: ${describeError(error)}`);
        return null;
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        logger.error(`Configuration file ${configPath} is not valid JSON: ${describeError(error)}`);
        return null;
    }

    return parseConfig(raw, logger);
}

export function loadEnvironment(env: NodeJS.ProcessEnv, logger: Logger): Environment | null {
    const parsed = environmentSchema.safeParse(env);
    if (!parsed.success) {
        logger.error(`Invalid environment: ${formatIssues(parsed.error)}`);
        return null;
    }
    return parsed.data;
}
