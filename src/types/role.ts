/**
 * Roles a person can hold on an IETF document, in report order.
 */
export const ROLE_CATEGORIES = [
    'authored',
    'shepherded',
    'responsibleAd',
    'balloted',
    'acknowledged',
] as const;

export type RoleCategory = (typeof ROLE_CATEGORIES)[number];

/**
 * Display label for each category.
 */
export const ROLE_LABELS: Record<RoleCategory, string> = {
    authored: 'Authored',
    shepherded: 'Shepherded',
    responsibleAd: 'Responsible AD',
    balloted: 'Balloted',
    acknowledged: 'Acknowledged',
};

/**
 * Fetch results for a full run: one identifier sequence per category.
 */
export type RoleResults = Record<RoleCategory, string[]>;
