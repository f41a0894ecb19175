import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, LOG_LEVELS } from '../types/index.js';
import { ENTRY_TYPES, FIELD_SCHEMA, typeTag, variantForTag } from '../schema/fields.js';
import { createThesis } from '../entries/entry.js';

describe('Types', () => {
    describe('FIELD_SCHEMA', () => {
        it('should define a layout for all 7 entry types', () => {
            expect(ENTRY_TYPES).toHaveLength(7);
            expect(Object.keys(FIELD_SCHEMA).sort()).toEqual([...ENTRY_TYPES].sort());
        });

        it('every layout should start with author and title', () => {
            for (const type of ENTRY_TYPES) {
                const names = FIELD_SCHEMA[type].map((spec) => spec.name);
                expect(names.slice(0, 2)).toEqual(['author', 'title']);
            }
        });

        it('every layout should end with doi, url and note', () => {
            for (const type of ENTRY_TYPES) {
                const names = FIELD_SCHEMA[type].map((spec) => spec.name);
                expect(names.slice(-3)).toEqual(['doi', 'url', 'note']);
            }
        });

        it('should lay out Article fields in emission order', () => {
            expect(FIELD_SCHEMA.Article.map((spec) => spec.name)).toEqual([
                'author',
                'title',
                'journal',
                'year',
                'volume',
                'number',
                'pages',
                'article_number',
                'doi',
                'url',
                'note',
            ]);
        });

        it('should treat Article number as an integer and TechReport number as text', () => {
            const articleNumber = FIELD_SCHEMA.Article.find((spec) => spec.name === 'number');
            const reportNumber = FIELD_SCHEMA.TechReport.find((spec) => spec.name === 'number');

            expect(articleNumber?.kind).toBe('integer');
            expect(reportNumber?.kind).toBe('string');
        });

        it('should keep key, app and thesis_type out of record bodies', () => {
            for (const type of ENTRY_TYPES) {
                const names: string[] = FIELD_SCHEMA[type].map((spec) => spec.name);
                expect(names).not.toContain('key');
                expect(names).not.toContain('app');
                expect(names).not.toContain('thesis_type');
            }
        });
    });

    describe('BibTeX tags', () => {
        it('should map theses to phdthesis and mastersthesis', () => {
            const fields = { author: ['Student, Alice'], title: 'My Thesis', year: 2022, school: 'MIT' };

            expect(typeTag(createThesis({ ...fields, thesis_type: 'phd' }))).toBe('phdthesis');
            expect(typeTag(createThesis({ ...fields, thesis_type: 'masters' }))).toBe('mastersthesis');
        });

        it('should resolve tags case-insensitively', () => {
            expect(variantForTag('ARTICLE')).toEqual({ type: 'Article' });
            expect(variantForTag('InProceedings')).toEqual({ type: 'InProceedings' });
            expect(variantForTag('PhDThesis')).toEqual({ type: 'Thesis', thesisType: 'phd' });
        });

        it('should not resolve a bare thesis tag or an unknown tag', () => {
            expect(variantForTag('thesis')).toBeNull();
            expect(variantForTag('unpublished')).toBeNull();
        });
    });

    describe('DEFAULT_CONFIG', () => {
        it('should write references.bib by default', () => {
            expect(DEFAULT_CONFIG.out).toBe('references.bib');
        });

        it('should log at info level by default', () => {
            expect(DEFAULT_CONFIG.logLevel).toBe('info');
        });

        it('should use pretty logs by default', () => {
            expect(DEFAULT_CONFIG.jsonLogs).toBe(false);
        });

        it('default log level should be a known level', () => {
            expect(LOG_LEVELS).toContain(DEFAULT_CONFIG.logLevel);
        });
    });
});
