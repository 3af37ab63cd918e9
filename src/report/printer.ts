import { ROLE_LABELS, type Report } from '../types/index.js';

const INDENT = '    ';

/**
 * Render a report as text, one line per category followed by the run time.
 * Verbose mode lists each matching document under its category.
 */
export function renderReport(report: Report, options: { verbose?: boolean } = {}): string {
    const lines: string[] = [];

    for (const { category, count, documents } of report.categories) {
        lines.push(`${ROLE_LABELS[category]}: ${count}`);
        if (options.verbose) {
            for (const id of documents) {
                lines.push(`${INDENT}${id}`);
            }
        }
    }

    lines.push('');
    lines.push(`finished in ${report.elapsedSeconds.toFixed(2)} s`);

    return `${lines.join('\n')}\n`;
}

/**
 * Write the rendered report to stdout.
 */
export function printReport(
    report: Report,
    verbose: boolean,
    write: (text: string) => void = (text) => process.stdout.write(text)
): void {
    write(renderReport(report, { verbose }));
}
