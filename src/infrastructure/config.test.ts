import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestLogger } from '../testing/fakes';
import { collectionPlanOf, loadConfig, loadEnvironment, parseConfig } from './config';

describe('parseConfig', () => {
    it('fills in defaults for an empty object', () => {
        const config = parseConfig({}, createTestLogger());

        expect(config).toEqual({
            language: 'python',
            stars: '>=500',
            topics: [],
            keywords: [],
            sort: 'stars',
            order: 'desc',
            per_page: 5,
            min_contributors: 1,
            output: 'output.json',
            contributors: { per_page: 100, max_pages: 10, estimation_threshold: 500 },
        });
    });

    it('renders numeric qualifiers as text', () => {
        const config = parseConfig({ stars: 100, size: 2048 }, createTestLogger());

        expect(config?.stars).toBe('100');
        expect(config?.size).toBe('2048');
    });

    it('rejects filters it does not recognise', () => {
        const logger = createTestLogger();

        expect(parseConfig({ licence: 'mit' }, logger)).toBeNull();
        expect(logger.error).toHaveBeenCalledWith(
            "Invalid configuration: (root): Unrecognized key(s) in object: 'licence'"
        );
    });

    it('accepts concurrency as another name for threads', () => {
        const config = parseConfig({ concurrency: 4 }, createTestLogger());

        expect(config?.threads).toBe(4);
        expect(config && 'concurrency' in config).toBe(false);
    });

    it('rejects setting both threads and concurrency', () => {
        const logger = createTestLogger();

        expect(parseConfig({ threads: 2, concurrency: 4 }, logger)).toBeNull();
        expect(logger.error).toHaveBeenCalledWith(
            'Invalid configuration: concurrency: concurrency is an alias of threads; set only one'
        );
    });

    it('rejects a page size above 100', () => {
        const logger = createTestLogger();

        expect(parseConfig({ per_page: 500 }, logger)).toBeNull();
        expect(logger.error).toHaveBeenCalledTimes(1);
    });
});

describe('collectionPlanOf', () => {
    it('maps configuration onto search filters and collection limits', () => {
        const config = parseConfig(
            { fork: 'only', author: 'octo', topics: ['cli'], keywords: ['http'], concurrency: 3 },
            createTestLogger()
        );

        expect(config && collectionPlanOf(config)).toEqual({
            filters: {
                language: 'python',
                stars: '>=500',
                fork: 'only',
                author: 'octo',
                topics: ['cli'],
            },
            keywords: ['http'],
            sort: 'stars',
            order: 'desc',
            perPage: 5,
            maxResults: 5,
            minContributors: 1,
            concurrency: 3,
        });
    });

    it('takes max_results over the page size when given', () => {
        const config = parseConfig({ per_page: 10, max_results: 40 }, createTestLogger());

        expect(config && collectionPlanOf(config).maxResults).toBe(40);
    });
});

describe('loadConfig', () => {
    let directory: string;

    beforeEach(async () => {
        directory = await mkdtemp(join(tmpdir(), 'collector-config-'));
    });

    afterEach(async () => {
        await rm(directory, { recursive: true, force: true });
    });

    it('reads and validates a configuration file', async () => {
        const path = join(directory, 'configs.json');
        await writeFile(path, JSON.stringify({ language: 'go', per_page: 10, threads: 2 }));

        const config = await loadConfig(path, createTestLogger());

        expect(config?.language).toBe('go');
        expect(config?.per_page).toBe(10);
        expect(config?.threads).toBe(2);
    });

    it('returns null for a missing file', async () => {
        const logger = createTestLogger();

        expect(await loadConfig(join(directory, 'missing.json'), logger)).toBeNull();
        expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('returns null for malformed JSON', async () => {
        const path = join(directory, 'configs.json');
        await writeFile(path, '{ "language": ');
        const logger = createTestLogger();

        expect(await loadConfig(path, logger)).toBeNull();
        expect(logger.error).toHaveBeenCalledTimes(1);
    });
});

describe('loadEnvironment', () => {
    it('treats empty values as unset and applies defaults', () => {
        const environment = loadEnvironment({ GITHUB_TOKEN: '', PG_CONNECTION_STRING: '' }, createTestLogger());

        expect(environment).toEqual({
            GITHUB_API_URL: 'https://api.github.com',
            CONFIG_PATH: 'configs.json',
        });
    });

    it('keeps provided values', () => {
        const environment = loadEnvironment(
            { GITHUB_TOKEN: 'test-token', GITHUB_API_URL: 'https://github.example.test/api/v3', CONFIG_PATH: 'custom.json' },
            createTestLogger()
        );

        expect(environment).toEqual({
            GITHUB_TOKEN: 'test-token',
            GITHUB_API_URL: 'https://github.example.test/api/v3',
            CONFIG_PATH: 'custom.json',
        });
    });

    it('rejects an API url that is not a url', () => {
        const logger = createTestLogger();

        expect(loadEnvironment({ GITHUB_API_URL: 'not a url' }, logger)).toBeNull();
        expect(logger.error).toHaveBeenCalledTimes(1);
    });
});
