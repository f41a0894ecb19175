export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

/**
 * Log level options.
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Full citebundle configuration merged from CLI flags, env vars, and config file.
 */
export interface CitebundleConfig {
    // Output
    /** Bibliography file written by `merge` */
    out: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CitebundleConfig = {
    out: 'references.bib',
    logLevel: 'info',
    jsonLogs: false,
};
