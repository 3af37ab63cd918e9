/**
 * Shared helpers for turning service records into report identifiers.
 */

/**
 * Last non-empty path segment of a Datatracker resource URI.
 * "/api/v1/doc/document/rfc9000/" → "rfc9000"
 */
export function lastUriSegment(uri: string): string | null {
    const segments = uri.split('?')[0]?.split('/').filter((s) => s.length > 0) ?? [];
    return segments[segments.length - 1] ?? null;
}

/**
 * Canonical identifier for a document.
 * RFCs become "RFC<n>"; anything else keeps its name.
 */
export function formatDocumentId(name: string, rfcNumber?: number | null): string {
    if (rfcNumber) return `RFC${rfcNumber}`;

    const match = /^rfc0*(\d+)$/i.exec(name);
    if (match?.[1]) return `RFC${match[1]}`;

    return name;
}

/**
 * RFC number of an identifier produced by `formatDocumentId`.
 * "RFC9000" → 9000; draft names → null
 */
export function rfcNumberOf(id: string): number | null {
    const match = /^RFC(\d+)$/.exec(id);
    return match?.[1] ? Number.parseInt(match[1], 10) : null;
}

/**
 * Remove duplicates, keeping the first occurrence of each value.
 */
export function uniqueInOrder(values: Iterable<string>): string[] {
    return [...new Set(values)];
}

/**
 * Collapse runs of whitespace (including line breaks) to single spaces.
 */
export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}
