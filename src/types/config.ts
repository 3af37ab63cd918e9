/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Datatracker standards-level slugs an RFC can carry.
 */
export const STD_LEVELS = ['std', 'ds', 'ps', 'bcp', 'inf', 'exp', 'hist', 'unkn'] as const;

export type StdLevel = (typeof STD_LEVELS)[number];

/**
 * Narrow a slug string to a known standards level.
 */
export function findStdLevel(slug: string): StdLevel | undefined {
    return STD_LEVELS.find((level) => level === slug);
}

/**
 * Full status names as printed in the RFC index, mapped to their slugs.
 */
export const STD_LEVEL_NAMES: Record<string, StdLevel> = {
    'INTERNET STANDARD': 'std',
    'DRAFT STANDARD': 'ds',
    'PROPOSED STANDARD': 'ps',
    'BEST CURRENT PRACTICE': 'bcp',
    'INFORMATIONAL': 'inf',
    'EXPERIMENTAL': 'exp',
    'HISTORIC': 'hist',
    'UNKNOWN': 'unkn',
};

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface ReportConfig {
    // Input
    name?: string;
    verbose: boolean;

    // Remote services
    datatrackerUrl: string;
    rfcEditorUrl: string;
    timeout: number;
    pageSize: number;

    // Acknowledgment scan
    firstRfc: number;
    lastRfc: number;
    statuses: StdLevel[];

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ReportConfig = {
    verbose: false,
    datatrackerUrl: 'https://datatracker.ietf.org',
    rfcEditorUrl: 'https://www.rfc-editor.org',
    timeout: 30000,
    pageSize: 500,
    // RFC 9200 was published early 2022
    firstRfc: 9200,
    lastRfc: 20000,
    statuses: ['ps', 'bcp', 'hist', 'exp', 'inf'],
    logLevel: 'info',
    jsonLogs: false,
};
