import type { z } from 'zod';
import {
    findStdLevel,
    type ReportConfig,
    type RoleCategory,
    type RoleSource,
    type StdLevel,
} from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { ParseError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { isAcknowledged } from './acknowledgments.js';
import {
    ballotPositionSchema,
    documentAuthorSchema,
    documentSchema,
    listResponseSchema,
    personSchema,
    relatedDocumentSchema,
    type DocumentRecord,
} from './schemas.js';
import { formatDocumentId, lastUriSegment, rfcNumberOf, uniqueInOrder } from './utils.js';

/**
 * Settings the Datatracker source reads from the run configuration.
 */
export type DatatrackerSourceOptions = Pick<
    ReportConfig,
    'datatrackerUrl' | 'rfcEditorUrl' | 'pageSize' | 'firstRfc' | 'lastRfc' | 'statuses'
>;

/**
 * Categories answered by a single Datatracker listing.
 */
type ListedCategory = Exclude<RoleCategory, 'acknowledged'>;

/**
 * How one role maps onto a Datatracker list endpoint.
 */
interface RoleQuery {
    /** Resource path under /api/v1/ */
    resource: string;

    /** Query parameter that takes the person id */
    personFilter: string;

    /** Fixed query parameters */
    filters: Record<string, string>;

    /** Validate one listed object and return its document identifier */
    identify: (raw: unknown, url: string) => string;
}

/**
 * An RFC inside the configured number range and standards levels.
 */
export interface RfcCandidate {
    number: number;
    stdLevel: StdLevel;
}

/**
 * Build a validator that turns a raw list object into an identifier.
 */
function recordReader<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    label: string,
    toId: (record: T) => string | null
): (raw: unknown, url: string) => string {
    return (raw, url) => {
        const result = schema.safeParse(raw);
        if (!result.success) {
            throw new ParseError(`Unexpected ${label} record: ${formatIssues(result.error)}`, url);
        }
        const id = toId(result.data);
        if (id === null) {
            throw new ParseError(`Cannot derive a document identifier from ${label} record`, url);
        }
        return id;
    };
}

const fromDocumentUri = (uri: string): string | null => {
    const name = lastUriSegment(uri);
    return name === null ? null : formatDocumentId(name);
};

const documentIdentifier = recordReader(documentSchema, 'document', (doc) =>
    formatDocumentId(doc.name, doc.rfc_number)
);

export const ROLE_QUERIES: Record<ListedCategory, RoleQuery> = {
    authored: {
        resource: 'doc/documentauthor',
        personFilter: 'person',
        filters: { document__type: 'rfc' },
        identify: recordReader(documentAuthorSchema, 'documentauthor', (r) => fromDocumentUri(r.document)),
    },
    shepherded: {
        resource: 'doc/document',
        personFilter: 'shepherd__person',
        filters: { type: 'draft', states__slug: 'rfc' },
        identify: documentIdentifier,
    },
    responsibleAd: {
        resource: 'doc/document',
        personFilter: 'ad',
        filters: { type: 'draft', states__slug: 'rfc' },
        identify: documentIdentifier,
    },
    balloted: {
        resource: 'doc/ballotpositiondocevent',
        personFilter: 'balloter',
        filters: { doc__type: 'draft', doc__states__slug: 'rfc' },
        identify: recordReader(ballotPositionSchema, 'ballotpositiondocevent', (r) => fromDocumentUri(r.doc)),
    },
};

const relatedTarget = recordReader(relatedDocumentSchema, 'relateddocument', (r) => fromDocumentUri(r.target));

/**
 * Role source backed by the IETF Datatracker REST API, with acknowledgments
 * read from the RFC Editor's plain-text RFCs.
 *
 * Every category is reported as RFC identifiers restricted to the candidate
 * window (RFC number range and standards levels). Drafts are mapped to the
 * RFC they became.
 *
 * Every request goes through the injected client, one at a time. Person
 * lookups, the candidate list and draft-to-RFC mappings are kept for the
 * lifetime of the instance, which is one run.
 */
export class DatatrackerSource implements RoleSource {
    private readonly personIds = new Map<string, number[]>();
    private readonly rfcByDraft = new Map<string, string | null>();
    private candidates: RfcCandidate[] | null = null;

    constructor(
        private readonly http: HttpClient,
        private readonly options: DatatrackerSourceOptions
    ) {}

    async fetch(category: RoleCategory, personName: string): Promise<string[]> {
        const documents = category === 'acknowledged'
            ? await this.fetchAcknowledged(personName)
            : await this.fetchListed(category, personName);

        getLogger().debug({ category, count: documents.length }, 'Fetched role documents');
        return documents;
    }

    /**
     * Person ids whose name matches exactly, as decided by the service.
     */
    async resolvePerson(personName: string): Promise<number[]> {
        const known = this.personIds.get(personName);
        if (known) return known;

        const objects = await this.list('person/person', { name: personName });
        const ids = objects.map((raw) => {
            const result = personSchema.safeParse(raw);
            if (!result.success) {
                throw new ParseError(`Unexpected person record: ${formatIssues(result.error)}`, this.apiUrl('person/person'));
            }
            return result.data.id;
        });

        if (ids.length === 0) {
            getLogger().warn({ name: personName }, 'No Datatracker person with this exact name');
        } else if (ids.length > 1) {
            getLogger().warn({ name: personName, ids }, 'Several Datatracker persons share this name, merging their records');
        }

        this.personIds.set(personName, ids);
        return ids;
    }

    /**
     * RFCs inside the configured number range and standards levels.
     */
    async listCandidateRfcs(): Promise<RfcCandidate[]> {
        if (this.candidates) return this.candidates;

        const { firstRfc, lastRfc, statuses } = this.options;
        const objects = await this.list('doc/document', {
            type: 'rfc',
            rfc_number__gte: String(firstRfc),
            rfc_number__lte: String(lastRfc),
        });

        const candidates: RfcCandidate[] = [];
        for (const raw of objects) {
            const result = documentSchema.safeParse(raw);
            if (!result.success) {
                throw new ParseError(`Unexpected document record: ${formatIssues(result.error)}`, this.apiUrl('doc/document'));
            }

            const candidate = toCandidate(result.data);
            if (!candidate) continue;
            // The service may ignore the range filters
            if (candidate.number < firstRfc || candidate.number > lastRfc) continue;
            if (!statuses.includes(candidate.stdLevel)) continue;

            candidates.push(candidate);
        }

        getLogger().debug({ count: candidates.length, firstRfc, lastRfc, statuses }, 'Candidate RFCs');
        this.candidates = candidates;
        return candidates;
    }

    // ─── Private helpers ──────────────────────────────────────

    private async fetchListed(category: ListedCategory, personName: string): Promise<string[]> {
        const query = ROLE_QUERIES[category];
        const personIds = await this.resolvePerson(personName);
        if (personIds.length === 0) return [];

        const identifiers: string[] = [];
        for (const personId of personIds) {
            const url = this.apiUrl(query.resource);
            const objects = await this.list(query.resource, {
                ...query.filters,
                [query.personFilter]: String(personId),
            });
            identifiers.push(...objects.map((raw) => query.identify(raw, url)));
        }

        return this.keepCandidates(uniqueInOrder(identifiers));
    }

    /**
     * Map identifiers to RFCs and keep those inside the candidate window.
     */
    private async keepCandidates(identifiers: string[]): Promise<string[]> {
        const window = new Set((await this.listCandidateRfcs()).map((c) => c.number));

        const kept: string[] = [];
        for (const id of identifiers) {
            const rfc = await this.toRfcId(id);
            const number = rfc === null ? null : rfcNumberOf(rfc);
            if (rfc !== null && number !== null && window.has(number)) {
                kept.push(rfc);
            }
        }

        return uniqueInOrder(kept);
    }

    /**
     * The RFC a draft became, via its `became_rfc` relation.
     * @returns null for drafts that were never published
     */
    private async toRfcId(id: string): Promise<string | null> {
        if (rfcNumberOf(id) !== null) return id;

        const known = this.rfcByDraft.get(id);
        if (known !== undefined) return known;

        const resource = 'doc/relateddocument';
        const url = this.apiUrl(resource);
        const objects = await this.list(resource, { source__name: id, relationship: 'became_rfc' });
        const rfc = objects
            .map((raw) => relatedTarget(raw, url))
            .find((target) => rfcNumberOf(target) !== null) ?? null;

        this.rfcByDraft.set(id, rfc);
        return rfc;
    }

    private async fetchAcknowledged(personName: string): Promise<string[]> {
        const candidates = await this.listCandidateRfcs();
        const base = trimTrailingSlash(this.options.rfcEditorUrl);

        const acknowledged: string[] = [];
        for (const { number } of candidates) {
            const response = await this.http.getText(`${base}/rfc/rfc${number}.txt`);
            if (isAcknowledged(response.data, personName)) {
                acknowledged.push(formatDocumentId(`rfc${number}`));
            }
        }

        return uniqueInOrder(acknowledged);
    }

    /**
     * GET every page of a list endpoint, following `meta.next`.
     */
    private async list(resource: string, params: Record<string, string>): Promise<unknown[]> {
        const first = new URL(this.apiUrl(resource));
        first.searchParams.set('format', 'json');
        first.searchParams.set('limit', String(this.options.pageSize));
        for (const [key, value] of Object.entries(params)) {
            first.searchParams.set(key, value);
        }

        const objects: unknown[] = [];
        const visited = new Set<string>();
        let next: string | null = first.toString();

        while (next !== null && !visited.has(next)) {
            visited.add(next);
            const response = await this.http.getJson(next);
            const page = listResponseSchema.safeParse(response.data);
            if (!page.success) {
                throw new ParseError(`Unexpected list response: ${formatIssues(page.error)}`, next);
            }

            objects.push(...page.data.objects);
            next = page.data.meta.next === null
                ? null
                : new URL(page.data.meta.next, this.options.datatrackerUrl).toString();
        }

        return objects;
    }

    private apiUrl(resource: string): string {
        return `${trimTrailingSlash(this.options.datatrackerUrl)}/api/v1/${resource}/`;
    }
}

function toCandidate(doc: DocumentRecord): RfcCandidate | null {
    const number = rfcNumberOf(formatDocumentId(doc.name, doc.rfc_number));
    if (number === null) return null;

    const slug = doc.std_level ? lastUriSegment(doc.std_level) : null;
    return {
        number,
        stdLevel: (slug && findStdLevel(slug)) || 'unkn',
    };
}

function trimTrailingSlash(url: string): string {
    return url.replace(/\/+$/, '');
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}
