import { describe, it, expect } from 'vitest';
import {
    DEFAULT_CONFIG,
    ROLE_CATEGORIES,
    ROLE_LABELS,
    STD_LEVELS,
    STD_LEVEL_NAMES,
    findStdLevel,
} from '../types/index.js';

describe('Types', () => {
    describe('ROLE_CATEGORIES', () => {
        it('should list the five roles in report order', () => {
            expect(ROLE_CATEGORIES).toEqual([
                'authored',
                'shepherded',
                'responsibleAd',
                'balloted',
                'acknowledged',
            ]);
        });

        it('should have a label for every role', () => {
            expect(ROLE_CATEGORIES.map((c) => ROLE_LABELS[c])).toEqual([
                'Authored',
                'Shepherded',
                'Responsible AD',
                'Balloted',
                'Acknowledged',
            ]);
        });
    });

    describe('standards levels', () => {
        it('should map every full status name to a known slug', () => {
            for (const slug of Object.values(STD_LEVEL_NAMES)) {
                expect(STD_LEVELS).toContain(slug);
            }
        });

        it('should narrow known slugs only', () => {
            expect(findStdLevel('bcp')).toBe('bcp');
            expect(findStdLevel('BCP')).toBeUndefined();
            expect(findStdLevel('draft')).toBeUndefined();
        });
    });

    describe('DEFAULT_CONFIG', () => {
        it('should point at the public services', () => {
            expect(DEFAULT_CONFIG.datatrackerUrl).toBe('https://datatracker.ietf.org');
            expect(DEFAULT_CONFIG.rfcEditorUrl).toBe('https://www.rfc-editor.org');
        });

        it('should scan the usual RFC statuses for acknowledgments', () => {
            expect(DEFAULT_CONFIG.statuses).toEqual(['ps', 'bcp', 'hist', 'exp', 'inf']);
        });

        it('should have a valid RFC range', () => {
            expect(DEFAULT_CONFIG.firstRfc).toBeLessThanOrEqual(DEFAULT_CONFIG.lastRfc);
        });

        it('should not be verbose by default', () => {
            expect(DEFAULT_CONFIG.verbose).toBe(false);
        });
    });
});
