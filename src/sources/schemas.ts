import { z } from 'zod';

/**
 * Datatracker REST API record shapes (subset of relevant fields).
 * Unknown fields are ignored; missing or mistyped ones are parse errors.
 *
 * @see https://datatracker.ietf.org/api/
 */

/**
 * Envelope of every list endpoint. `next` is a path relative to the host.
 */
export const listResponseSchema = z.object({
    meta: z.object({
        limit: z.number().int().optional(),
        offset: z.number().int().optional(),
        next: z.string().nullable(),
        total_count: z.number().int().optional(),
    }),
    objects: z.array(z.unknown()),
});

export const personSchema = z.object({
    id: z.number().int(),
    name: z.string(),
});

export const documentSchema = z.object({
    name: z.string().min(1),
    rfc_number: z.number().int().positive().nullable().optional(),
    std_level: z.string().nullable().optional(),
});

export type DocumentRecord = z.infer<typeof documentSchema>;

/** `doc/documentauthor` */
export const documentAuthorSchema = z.object({
    document: z.string().min(1),
});

/** `doc/ballotpositiondocevent` */
export const ballotPositionSchema = z.object({
    doc: z.string().min(1),
    pos: z.string().nullable().optional(),
});

/** `doc/relateddocument`, e.g. a draft that `became_rfc` */
export const relatedDocumentSchema = z.object({
    target: z.string().min(1),
});
