import type { RoleCategory } from './role.js';

/**
 * Anything that can list the documents in which a person held a role.
 * The Datatracker client is the production implementation; tests use fakes.
 */
export interface RoleSource {
    /**
     * Fetch document identifiers for one role.
     * Identifiers come back in service order without duplicates.
     *
     * @throws NetworkError when the service is unreachable or answers non-2xx
     * @throws ParseError when the payload does not have the expected shape
     */
    fetch(category: RoleCategory, personName: string): Promise<string[]>;
}
