import { collapseWhitespace } from './utils.js';

/**
 * Section heading at column 0, optionally numbered:
 * "Acknowledgments", "11.  Acknowledgements", "Appendix B.  Acknowledgments".
 * Table-of-contents entries are indented and never match.
 */
const ACK_HEADING = /^(?:(?:Appendix\s+[A-Z](?:\.\d+)*\.?|\d+(?:\.\d+)*\.?)\s+)?Acknowledge?ments?\s*$/i;

/** Running footer, e.g. "Wouters, et al.   Standards Track   [Page 12]" */
const PAGE_FOOTER = /\[Page \d+\]\s*$/;

/** Running header, e.g. "RFC 9000   QUIC Transport   May 2021" */
const PAGE_HEADER = /^RFC \d+\s/;

/**
 * Extract the body of the Acknowledgments section from a plain-text RFC.
 * The section ends at the next column-0 heading; page headers and footers
 * inside it are dropped.
 *
 * @returns the section body, or null when the RFC has no such section
 */
export function extractAcknowledgments(rfcText: string): string | null {
    const lines = rfcText.replace(/\f/g, '').split(/\r?\n/);
    const start = lines.findIndex((line) => ACK_HEADING.test(line));
    if (start === -1) return null;

    const body: string[] = [];
    for (const line of lines.slice(start + 1)) {
        if (PAGE_FOOTER.test(line) || PAGE_HEADER.test(line)) continue;
        if (/^\S/.test(line)) break;
        body.push(line);
    }

    return body.join('\n');
}

/**
 * Whether `name` is credited in the Acknowledgments section of `rfcText`.
 * Matching is case-sensitive; line breaks inside the name are tolerated.
 */
export function isAcknowledged(rfcText: string, name: string): boolean {
    const section = extractAcknowledgments(rfcText);
    if (section === null) return false;

    const needle = collapseWhitespace(name);
    if (!needle) return false;

    return collapseWhitespace(section).includes(needle);
}
