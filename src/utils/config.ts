import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    STD_LEVELS,
    STD_LEVEL_NAMES,
    findStdLevel,
    type ReportConfig,
    type StdLevel,
} from '../types/index.js';
import { InputError } from './errors.js';
import { getLogger } from './logger.js';

/**
 * Shape accepted in rfcroles.config.json. Every key is optional.
 */
const configFileSchema = z
    .object({
        datatrackerUrl: z.string().url(),
        rfcEditorUrl: z.string().url(),
        timeout: z.number().int().positive(),
        pageSize: z.number().int().positive(),
        firstRfc: z.number().int().nonnegative(),
        lastRfc: z.number().int().nonnegative(),
        statuses: z.array(z.enum(STD_LEVELS)),
        logLevel: z.enum(['error', 'warn', 'info', 'debug']),
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Validate a parsed config file.
 * @returns the typed config, or null if it does not match the schema
 */
export function parseConfigFile(raw: unknown): ConfigFile | null {
    const result = configFileSchema.safeParse(raw);
    if (!result.success) {
        getLogger().warn({ issues: result.error.issues }, 'Invalid config file, using defaults');
        return null;
    }
    return result.data;
}

/**
 * Load configuration from rfcroles.config.json using cosmiconfig.
 * Returns null when there is no file; defaults apply.
 */
async function loadConfigFile(): Promise<ConfigFile | null> {
    const explorer = cosmiconfig('rfcroles', {
        searchPlaces: ['rfcroles.config.json'],
    });

    try {
        const result = await explorer.search();
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            const config: unknown = result.config;
            return parseConfigFile(config);
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<ReportConfig> {
    const config: Partial<ReportConfig> = {};

    const datatrackerUrl = env['DATATRACKER_URL'];
    if (datatrackerUrl) config.datatrackerUrl = datatrackerUrl;

    const rfcEditorUrl = env['RFC_EDITOR_URL'];
    if (rfcEditorUrl) config.rfcEditorUrl = rfcEditorUrl;

    const timeout = env['RFC_ROLES_TIMEOUT'];
    if (timeout) {
        const parsed = Number.parseInt(timeout, 10);
        if (Number.isNaN(parsed) || parsed <= 0) {
            getLogger().warn({ value: timeout }, 'Ignoring invalid RFC_ROLES_TIMEOUT');
        } else {
            config.timeout = parsed;
        }
    }

    return config;
}

/**
 * Merge configuration layers.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * Keys present in `cliFlags` win even when undefined, so callers only set
 * the flags the user passed.
 */
export function mergeConfig(
    fileConfig: ConfigFile | null,
    envConfig: Partial<ReportConfig>,
    cliFlags: Partial<ReportConfig>
): ReportConfig {
    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
    };
}

/**
 * Resolve the full configuration for a run.
 */
export async function resolveConfig(cliFlags: Partial<ReportConfig>): Promise<ReportConfig> {
    const fileConfig = await loadConfigFile();
    const envConfig = loadEnvVars();
    return mergeConfig(fileConfig, envConfig, cliFlags);
}

/**
 * Parse an `--include` value such as "std,DRAFT STANDARD" into slugs.
 * Accepts slugs or full status names, case-insensitively.
 */
export function parseStatusList(value: string): StdLevel[] {
    const statuses: StdLevel[] = [];

    for (const part of value.split(',')) {
        const token = part.trim();
        if (!token) continue;

        const slug = toStdLevel(token);
        if (!slug) {
            throw new InputError(
                `Unknown status "${token}". Valid: ${STD_LEVELS.join(', ')} or ${Object.keys(STD_LEVEL_NAMES).join(', ')}`
            );
        }
        if (!statuses.includes(slug)) statuses.push(slug);
    }

    return statuses;
}

function toStdLevel(token: string): StdLevel | undefined {
    return findStdLevel(token.toLowerCase()) ?? STD_LEVEL_NAMES[token.toUpperCase()];
}
