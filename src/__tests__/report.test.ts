import { describe, it, expect, vi } from 'vitest';
import { aggregate } from '../report/aggregator.js';
import { printReport, renderReport } from '../report/printer.js';
import { generateReport, validatePersonName } from '../report/runner.js';
import type { RoleCategory, RoleResults, RoleSource } from '../types/index.js';
import { InputError, NetworkError } from '../utils/errors.js';

function ids(prefix: string, count: number): string[] {
    return Array.from({ length: count }, (_, i) => `${prefix}${i + 1}`);
}

function emptyResults(): RoleResults {
    return { authored: [], shepherded: [], responsibleAd: [], balloted: [], acknowledged: [] };
}

/**
 * Source that answers from a fixed table and records the calls it gets.
 */
class FakeSource implements RoleSource {
    readonly calls: Array<[RoleCategory, string]> = [];

    constructor(
        private readonly results: RoleResults,
        private readonly failOn?: RoleCategory
    ) {}

    async fetch(category: RoleCategory, personName: string): Promise<string[]> {
        this.calls.push([category, personName]);
        if (category === this.failOn) {
            throw new NetworkError('HTTP 500: Internal Server Error', 'https://example.test/api', 500);
        }
        return this.results[category];
    }
}

describe('aggregate', () => {
    it('should set each count to the number of documents', () => {
        const report = aggregate(
            { ...emptyResults(), authored: ['RFC1', 'RFC2'], balloted: ids('RFC', 7) },
            'Jane Doe',
            0,
            () => 0
        );

        for (const category of report.categories) {
            expect(category.count).toBe(category.documents.length);
        }
        expect(report.categories.map((c) => c.count)).toEqual([2, 0, 0, 7, 0]);
    });

    it('should order categories in report order', () => {
        const report = aggregate(emptyResults(), 'Jane Doe', 0, () => 0);
        expect(report.categories.map((c) => c.category)).toEqual([
            'authored',
            'shepherded',
            'responsibleAd',
            'balloted',
            'acknowledged',
        ]);
    });

    it('should compute elapsed seconds from the start time', () => {
        const report = aggregate(emptyResults(), 'Jane Doe', 1000, () => 3500);
        expect(report.elapsedSeconds).toBe(2.5);
    });

    it('should copy document lists', () => {
        const results = { ...emptyResults(), authored: ['RFC1'] };
        const report = aggregate(results, 'Jane Doe', 0, () => 0);

        results.authored.push('RFC2');

        expect(report.categories[0]?.documents).toEqual(['RFC1']);
    });
});

describe('renderReport', () => {
    it('should print one line per category and the elapsed time', () => {
        const report = aggregate(
            { ...emptyResults(), authored: ['RFC1'], acknowledged: ['RFC9', 'RFC10'] },
            'Jane Doe',
            0,
            () => 1234
        );

        expect(renderReport(report)).toBe(
            [
                'Authored: 1',
                'Shepherded: 0',
                'Responsible AD: 0',
                'Balloted: 0',
                'Acknowledged: 2',
                '',
                'finished in 1.23 s',
                '',
            ].join('\n')
        );
    });

    it('should list identifiers under each category when verbose', () => {
        const report = aggregate(
            { ...emptyResults(), authored: ['RFC1', 'RFC2'], shepherded: ['draft-ietf-foo-bar'] },
            'Jane Doe',
            0,
            () => 0
        );

        expect(renderReport(report, { verbose: true })).toBe(
            [
                'Authored: 2',
                '    RFC1',
                '    RFC2',
                'Shepherded: 1',
                '    draft-ietf-foo-bar',
                'Responsible AD: 0',
                'Balloted: 0',
                'Acknowledged: 0',
                '',
                'finished in 0.00 s',
                '',
            ].join('\n')
        );
    });

    it('should print all-zero counts and no identifiers for an empty report', () => {
        const report = aggregate(emptyResults(), 'Jane Doe', 0, () => 0);
        const text = renderReport(report, { verbose: true });

        expect(text.split('\n').slice(0, 5)).toEqual([
            'Authored: 0',
            'Shepherded: 0',
            'Responsible AD: 0',
            'Balloted: 0',
            'Acknowledged: 0',
        ]);
        expect(text.split('\n').filter((line) => line.startsWith('    '))).toEqual([]);
    });

    it('should render identical results identically apart from the elapsed time', () => {
        const results = { ...emptyResults(), authored: ['RFC1'], balloted: ['RFC5', 'RFC6'] };
        const first = renderReport(aggregate(results, 'Jane Doe', 0, () => 100), { verbose: true });
        const second = renderReport(aggregate(results, 'Jane Doe', 0, () => 4200), { verbose: true });

        const withoutTime = (text: string): string => text.replace(/finished in [\d.]+ s/, '');
        expect(first).not.toBe(second);
        expect(withoutTime(first)).toBe(withoutTime(second));
    });
});

describe('printReport', () => {
    it('should hand the rendered text to the writer', () => {
        const write = vi.fn();
        const report = aggregate(emptyResults(), 'Jane Doe', 0, () => 0);

        printReport(report, false, write);

        expect(write).toHaveBeenCalledTimes(1);
        expect(write).toHaveBeenCalledWith(renderReport(report));
    });
});

describe('validatePersonName', () => {
    it('should trim the name', () => {
        expect(validatePersonName('  Jane Doe ')).toBe('Jane Doe');
    });

    it('should reject missing, empty and blank names', () => {
        expect(() => validatePersonName(undefined)).toThrow(InputError);
        expect(() => validatePersonName('')).toThrow(InputError);
        expect(() => validatePersonName('   ')).toThrow(InputError);
    });
});

describe('generateReport', () => {
    it('should report the counts for every category in order', async () => {
        const source = new FakeSource({
            authored: ids('RFC', 12),
            shepherded: ids('RFC', 1),
            responsibleAd: ids('RFC', 3),
            balloted: ids('RFC', 115),
            acknowledged: ids('RFC', 45),
        });

        const report = await generateReport('Paul Wouters', source);

        expect(report.person).toBe('Paul Wouters');
        expect(report.categories.map((c) => c.count)).toEqual([12, 1, 3, 115, 45]);
        expect(renderReport(report).split('\n').slice(0, 5)).toEqual([
            'Authored: 12',
            'Shepherded: 1',
            'Responsible AD: 3',
            'Balloted: 115',
            'Acknowledged: 45',
        ]);
    });

    it('should fetch the categories one at a time in fixed order', async () => {
        const source = new FakeSource(emptyResults());

        await generateReport('Jane Doe', source);

        expect(source.calls).toEqual([
            ['authored', 'Jane Doe'],
            ['shepherded', 'Jane Doe'],
            ['responsibleAd', 'Jane Doe'],
            ['balloted', 'Jane Doe'],
            ['acknowledged', 'Jane Doe'],
        ]);
    });

    it('should measure time from the first fetch', async () => {
        const readings = [10_000, 12_500];
        const clock = (): number => readings.shift() ?? 0;

        const report = await generateReport('Jane Doe', new FakeSource(emptyResults()), clock);

        expect(report.elapsedSeconds).toBe(2.5);
    });

    it('should throw InputError before fetching anything for an empty name', async () => {
        const source = new FakeSource(emptyResults());

        await expect(generateReport('', source)).rejects.toBeInstanceOf(InputError);
        expect(source.calls).toEqual([]);
    });

    it('should stop at the first failing fetch', async () => {
        const source = new FakeSource(emptyResults(), 'responsibleAd');

        await expect(generateReport('Jane Doe', source)).rejects.toBeInstanceOf(NetworkError);
        expect(source.calls.map(([category]) => category)).toEqual([
            'authored',
            'shepherded',
            'responsibleAd',
        ]);
    });
});
