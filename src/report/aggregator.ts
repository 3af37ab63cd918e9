import { ROLE_CATEGORIES, type Report, type RoleResults } from '../types/index.js';

/**
 * Build a Report from per-category fetch results.
 *
 * @param startedAt - `performance.now()` reading taken before the first fetch
 * @param now - clock used for the end of aggregation
 */
export function aggregate(
    results: RoleResults,
    person: string,
    startedAt: number,
    now: () => number = () => performance.now()
): Report {
    const categories = ROLE_CATEGORIES.map((category) => {
        const documents = [...results[category]];
        return { category, count: documents.length, documents };
    });

    return {
        person,
        categories,
        elapsedSeconds: Math.max(0, now() - startedAt) / 1000,
    };
}
