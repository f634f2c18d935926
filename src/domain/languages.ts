import type { LanguageBreakdown, LanguageBytes, LanguageShare } from './types';

const BREAKDOWN_DESCRIPTION =
    "The 'bytes' field represents the total number of bytes of code written in this language, " +
    "and 'percentage' shows its proportion relative to the total.";

/** Percentages are kept to two decimals, so the whole is 10000 hundredths. */
const WHOLE = 10_000;

/**
 * Splits WHOLE across the weights by largest remainder: every share is
 * floored, then the leftover units go to the largest remainders (earlier
 * entries first on a tie). The shares always add up to exactly WHOLE.
 */
function apportion(weights: readonly number[], total: number): number[] {
    const exact = weights.map(weight => (weight * WHOLE) / total);
    const units = exact.map(Math.floor);
    let leftover = WHOLE - units.reduce((sum, unit) => sum + unit, 0);

    const byRemainder = exact
        .map((value, index) => ({ index, remainder: value - units[index] }))
        .sort((a, b) => b.remainder - a.remainder);
    for (const { index } of byRemainder) {
        if (leftover <= 0) break;
        units[index] += 1;
        leftover -= 1;
    }
    return units;
}

/**
 * Turns a language → bytes map into shares sorted by size, largest first.
 * Returns null when there is nothing to divide by.
 */
export function formatLanguages(languages: LanguageBytes): LanguageBreakdown | null {
    const entries = Object.entries(languages);
    const totalBytes = entries.reduce((sum, [, bytes]) => sum + bytes, 0);
    if (entries.length === 0 || totalBytes <= 0) return null;

    entries.sort(([nameA, bytesA], [nameB, bytesB]) => bytesB - bytesA || nameA.localeCompare(nameB));
    const units = apportion(entries.map(([, bytes]) => bytes), totalBytes);

    const shares: LanguageShare[] = entries.map(([language, bytes], index) => ({
        language,
        bytes,
        percentage: units[index] / 100,
    }));

    return {
        total_bytes: totalBytes,
        languages: shares,
        description: BREAKDOWN_DESCRIPTION,
    };
}
