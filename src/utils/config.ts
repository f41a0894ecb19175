import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, LOG_LEVELS, type CitebundleConfig } from '../types/index.js';
import { getLogger } from './logger.js';

const ConfigFileSchema = z
    .object({
        out: z.string().min(1),
        logLevel: z.enum(LOG_LEVELS),
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

const EnvSchema = z.object({
    CITEBUNDLE_OUT: z.string().min(1).optional(),
    CITEBUNDLE_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export interface ResolveConfigOptions {
    /** Directory searched for a config file (default: cwd) */
    searchFrom?: string;
    env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from citebundle.config.json (or an rc file, or the
 * `citebundle` key of package.json) using cosmiconfig.
 * Returns null if no usable config file is found; defaults are used then.
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<CitebundleConfig> | null> {
    const explorer = cosmiconfig('citebundle', {
        searchPlaces: ['citebundle.config.json', '.citebundlerc', '.citebundlerc.json', 'package.json'],
        searchStrategy: 'none',
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = ConfigFileSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn(
                    { path: result.filepath, issues: parsed.error.issues.map((i) => i.message) },
                    'Invalid config file, using defaults'
                );
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(env: NodeJS.ProcessEnv): Partial<CitebundleConfig> {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        getLogger().warn(
            { issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
            'Ignoring invalid CITEBUNDLE_* environment variables'
        );
        return {};
    }

    const config: Partial<CitebundleConfig> = {};
    if (result.data.CITEBUNDLE_OUT) config.out = result.data.CITEBUNDLE_OUT;
    if (result.data.CITEBUNDLE_LOG_LEVEL) config.logLevel = result.data.CITEBUNDLE_LOG_LEVEL;
    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<CitebundleConfig>,
    options: ResolveConfigOptions = {}
): Promise<CitebundleConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env ?? process.env);

    // Unset flags must not mask lower-precedence sources
    const flags: Partial<CitebundleConfig> = {};
    if (cliFlags.out !== undefined) flags.out = cliFlags.out;
    if (cliFlags.logLevel !== undefined) flags.logLevel = cliFlags.logLevel;
    if (cliFlags.jsonLogs !== undefined) flags.jsonLogs = cliFlags.jsonLogs;

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...flags,
    };
}
