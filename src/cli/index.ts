#!/usr/bin/env node
import { Command } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { LOG_LEVELS, type CitebundleConfig, type LogLevel } from '../types/index.js';
import { describeCitationFiles, mergeCitationFiles } from './actions.js';

const VERSION = '1.0.0';

interface GlobalOptions {
    logLevel?: string;
    jsonLogs?: boolean;
}

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

function loggingFlags(opts: GlobalOptions): Partial<CitebundleConfig> {
    const flags: Partial<CitebundleConfig> = {};
    if (opts.logLevel !== undefined) {
        if (!isLogLevel(opts.logLevel)) {
            console.error(`Invalid log level: ${opts.logLevel}. Valid: ${LOG_LEVELS.join(', ')}`);
            process.exit(1);
        }
        flags.logLevel = opts.logLevel;
    }
    if (opts.jsonLogs) flags.jsonLogs = true;
    return flags;
}

const program = new Command();

program
    .name('citebundle')
    .description('Collect plugin citations into one collision-free BibTeX bibliography.')
    .version(VERSION);

// ─── MERGE command ────────────────────────────────────────

program
    .command('merge')
    .description('Merge .bib and .json citation files into one bibliography')
    .argument('<files...>', 'Citation files (.bib or .json)')
    .option('-o, --out <path>', 'Output bibliography path')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (files: string[], opts: GlobalOptions & { out?: string }) => {
        const config = await resolveConfig({ ...loggingFlags(opts), out: opts.out });
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

        const logger = getLogger();
        logger.info({ inputs: files.length, out: config.out }, 'Starting merge');

        try {
            const result = mergeCitationFiles(files, config.out);
            console.log(
                `Wrote ${result.written} citations to ${result.outputPath} ` +
                    `(${result.read - result.written} duplicates dropped)`
            );
        } catch (error) {
            logger.error({ error }, 'Merge failed');
            process.exit(1);
        }
    });

// ─── CHECK command ────────────────────────────────────────

program
    .command('check')
    .description('Validate citation files and list their entries')
    .argument('<files...>', 'Citation files (.bib or .json)')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (files: string[], opts: GlobalOptions) => {
        const config = await resolveConfig(loggingFlags(opts));
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

        try {
            for (const line of describeCitationFiles(files)) {
                console.log(line);
            }
        } catch (error) {
            getLogger().error({ error }, 'Check failed');
            process.exit(1);
        }
    });

await program.parseAsync();
