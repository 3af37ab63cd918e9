import type { RoleCategory } from './role.js';

/**
 * Documents matching one role for the queried person.
 * `count` always equals `documents.length`.
 */
export interface CategoryResult {
    category: RoleCategory;
    count: number;
    documents: string[];
}

/**
 * Aggregated result of one run. Printed once, never persisted.
 */
export interface Report {
    person: string;

    /** One entry per role, in `ROLE_CATEGORIES` order */
    categories: CategoryResult[];

    /** Wall-clock seconds from the first fetch to the end of aggregation */
    elapsedSeconds: number;
}
