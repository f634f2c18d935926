import { describe, expect, it } from 'vitest';
import { formatLanguages } from './languages';

describe('formatLanguages', () => {
    it('sorts languages by bytes, largest first, with their share of the total', () => {
        const breakdown = formatLanguages({ Python: 300, Shell: 100, C: 600 });

        expect(breakdown?.total_bytes).toBe(1000);
        expect(breakdown?.languages).toEqual([
            { language: 'C', bytes: 600, percentage: 60 },
            { language: 'Python', bytes: 300, percentage: 30 },
            { language: 'Shell', bytes: 100, percentage: 10 },
        ]);
    });

    it('rounds percentages to two decimals, giving the leftover hundredth to the first entry', () => {
        const breakdown = formatLanguages({ Go: 1, Rust: 1, Zig: 1 });
        const percentages = breakdown?.languages.map(entry => entry.percentage) ?? [];

        expect(percentages).toEqual([33.34, 33.33, 33.33]);
        const sum = percentages.reduce((total, value) => total + value, 0);
        expect(Math.abs(sum - 100)).toBeLessThanOrEqual(0.1);
    });

    it('keeps the sum within 0.1 of 100 across many equal languages', () => {
        const languages = Object.fromEntries(
            Array.from({ length: 60 }, (_, index) => [`Lang${String(index).padStart(2, '0')}`, 1])
        );

        const breakdown = formatLanguages(languages);
        const percentages = breakdown?.languages.map(entry => entry.percentage) ?? [];

        expect(percentages).toHaveLength(60);
        expect(percentages.slice(0, 40).every(value => value === 1.67)).toBe(true);
        expect(percentages.slice(40).every(value => value === 1.66)).toBe(true);
        expect(breakdown?.languages[0].language).toBe('Lang00');
        const sum = percentages.reduce((total, value) => total + value, 0);
        expect(Math.abs(sum - 100)).toBeLessThanOrEqual(0.1);
    });

    it('hands leftover hundredths to the largest remainders, not the largest languages', () => {
        const breakdown = formatLanguages({ A: 5, B: 3, C: 3, D: 3 });

        expect(breakdown?.languages.map(entry => entry.percentage)).toEqual([35.71, 21.43, 21.43, 21.43]);
    });

    it('orders equal byte counts by language name', () => {
        const breakdown = formatLanguages({ Ruby: 5, Elixir: 5, Lua: 10 });

        expect(breakdown?.languages.map(entry => entry.language)).toEqual(['Lua', 'Elixir', 'Ruby']);
    });

    it('returns null for an empty mapping', () => {
        expect(formatLanguages({})).toBeNull();
    });

    it('returns null when every language has zero bytes', () => {
        expect(formatLanguages({ Markdown: 0 })).toBeNull();
    });
});
