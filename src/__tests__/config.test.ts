import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resolveConfig } from '../utils/config.js';
import { DEFAULT_CONFIG } from '../types/index.js';

let testDir: string;

beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'citebundle-config-'));
});

afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
});

function writeConfig(name: string, content: unknown): void {
    writeFileSync(join(testDir, name), JSON.stringify(content), 'utf-8');
}

describe('resolveConfig', () => {
    it('should fall back to defaults', async () => {
        const config = await resolveConfig({}, { searchFrom: testDir, env: {} });

        expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('should read citebundle.config.json', async () => {
        writeConfig('citebundle.config.json', { out: 'refs.bib', logLevel: 'debug' });

        const config = await resolveConfig({}, { searchFrom: testDir, env: {} });

        expect(config).toEqual({ out: 'refs.bib', logLevel: 'debug', jsonLogs: false });
    });

    it('should read the citebundle key of package.json', async () => {
        writeConfig('package.json', { name: 'host-app', citebundle: { jsonLogs: true } });

        const config = await resolveConfig({}, { searchFrom: testDir, env: {} });

        expect(config.jsonLogs).toBe(true);
    });

    it('should ignore an invalid config file', async () => {
        writeConfig('citebundle.config.json', { out: 42, colour: 'blue' });

        const config = await resolveConfig({}, { searchFrom: testDir, env: {} });

        expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('should let environment variables override the file', async () => {
        writeConfig('citebundle.config.json', { out: 'refs.bib', logLevel: 'debug' });

        const config = await resolveConfig(
            {},
            { searchFrom: testDir, env: { CITEBUNDLE_OUT: 'env.bib', CITEBUNDLE_LOG_LEVEL: 'error' } }
        );

        expect(config).toEqual({ out: 'env.bib', logLevel: 'error', jsonLogs: false });
    });

    it('should ignore invalid environment variables', async () => {
        const config = await resolveConfig(
            {},
            { searchFrom: testDir, env: { CITEBUNDLE_LOG_LEVEL: 'verbose' } }
        );

        expect(config.logLevel).toBe('info');
    });

    it('should let CLI flags override everything', async () => {
        writeConfig('citebundle.config.json', { out: 'refs.bib' });

        const config = await resolveConfig(
            { out: 'flag.bib', logLevel: 'warn' },
            { searchFrom: testDir, env: { CITEBUNDLE_OUT: 'env.bib' } }
        );

        expect(config).toEqual({ out: 'flag.bib', logLevel: 'warn', jsonLogs: false });
    });

    it('should not let unset flags mask lower sources', async () => {
        const config = await resolveConfig(
            { out: undefined, logLevel: undefined },
            { searchFrom: testDir, env: { CITEBUNDLE_OUT: 'env.bib' } }
        );

        expect(config.out).toBe('env.bib');
    });
});
