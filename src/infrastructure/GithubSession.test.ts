import { describe, expect, it } from 'vitest';
import { createGithubSession } from './GithubSession';

describe('createGithubSession', () => {
    it('builds frozen headers with a bearer token', () => {
        const session = createGithubSession({ token: ' test-token ' });

        expect(session).toEqual({
            baseUrl: 'https://api.github.com',
            headers: {
                'User-Agent': 'repo-metadata-collector',
                'X-GitHub-Api-Version': '2022-11-28',
                Authorization: 'Bearer test-token',
            },
        });
        expect(Object.isFrozen(session)).toBe(true);
        expect(Object.isFrozen(session.headers)).toBe(true);
    });

    it('leaves out authorization without a token and trims trailing slashes', () => {
        const session = createGithubSession({ baseUrl: 'https://github.example.test/api/v3//' });

        expect(session.baseUrl).toBe('https://github.example.test/api/v3');
        expect(session.headers).not.toHaveProperty('Authorization');
    });
});
