import { Command, InvalidArgumentError } from 'commander';
import { generateReport } from '../report/runner.js';
import { printReport } from '../report/printer.js';
import { DatatrackerSource } from '../sources/datatracker.js';
import type { LogLevel, ReportConfig, RoleSource, StdLevel } from '../types/index.js';
import { parseStatusList, resolveConfig } from '../utils/config.js';
import { ReportError } from '../utils/errors.js';
import { createHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger, initLogger } from '../utils/logger.js';

export const VERSION = '1.0.0';

/**
 * Parsed command-line options. Unset options stay undefined.
 */
export interface CliOptions {
    name?: string;
    verbose?: boolean;
    debug?: boolean;
    include?: StdLevel[];
    firstRfc?: number;
    lastRfc?: number;
    datatrackerUrl?: string;
    rfcEditorUrl?: string;
    timeout?: number;
    pageSize?: number;
    jsonLogs?: boolean;
}

/**
 * Seams for tests. Every field defaults to the production wiring.
 */
export interface CommandDependencies {
    resolveConfig?: (flags: Partial<ReportConfig>) => Promise<ReportConfig>;
    createSource?: (http: HttpClient, config: ReportConfig) => RoleSource;
    setupLogger?: (options: { level: LogLevel; jsonLogs: boolean }) => void;
    stdout?: (text: string) => void;
    stderr?: (text: string) => void;
    setExitCode?: (code: number) => void;
}

function parseNonNegativeInt(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (Number.isNaN(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
        throw new InvalidArgumentError('Not a non-negative integer.');
    }
    return parsed;
}

function parsePositiveInt(value: string): number {
    const parsed = parseNonNegativeInt(value);
    if (parsed === 0) {
        throw new InvalidArgumentError('Not a positive integer.');
    }
    return parsed;
}

function parseInclude(value: string, previous: StdLevel[] | undefined): StdLevel[] {
    try {
        const merged = [...(previous ?? [])];
        for (const status of parseStatusList(value)) {
            if (!merged.includes(status)) merged.push(status);
        }
        return merged;
    } catch (error) {
        throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
}

/**
 * Translate CLI options into config overrides, leaving out unset flags so
 * that the config file and environment still apply.
 */
export function toConfigFlags(opts: CliOptions): Partial<ReportConfig> {
    const flags: Partial<ReportConfig> = { verbose: opts.verbose ?? false };

    if (opts.name !== undefined) flags.name = opts.name;
    if (opts.debug) flags.logLevel = 'debug';
    if (opts.jsonLogs) flags.jsonLogs = true;
    if (opts.firstRfc !== undefined) flags.firstRfc = opts.firstRfc;
    if (opts.lastRfc !== undefined) flags.lastRfc = opts.lastRfc;
    if (opts.datatrackerUrl !== undefined) flags.datatrackerUrl = opts.datatrackerUrl;
    if (opts.rfcEditorUrl !== undefined) flags.rfcEditorUrl = opts.rfcEditorUrl;
    if (opts.timeout !== undefined) flags.timeout = opts.timeout;
    if (opts.pageSize !== undefined) flags.pageSize = opts.pageSize;

    return flags;
}

/**
 * `--include` extends the configured statuses instead of replacing them.
 */
export function withIncludedStatuses(config: ReportConfig, include: StdLevel[] | undefined): ReportConfig {
    if (!include?.length) return config;
    const statuses = [...config.statuses];
    for (const status of include) {
        if (!statuses.includes(status)) statuses.push(status);
    }
    return { ...config, statuses };
}

/**
 * Run one report and return the process exit code.
 * The HTTP client lives exactly as long as this call.
 */
export async function runReportCommand(opts: CliOptions, deps: CommandDependencies = {}): Promise<number> {
    const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
    const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));
    const loadConfig = deps.resolveConfig ?? resolveConfig;
    const setupLogger = deps.setupLogger ?? initLogger;
    const createSource = deps.createSource ?? ((http: HttpClient, config: ReportConfig) => new DatatrackerSource(http, config));

    let http: HttpClient | null = null;

    try {
        const config = withIncludedStatuses(await loadConfig(toConfigFlags(opts)), opts.include);
        setupLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

        http = createHttpClient({ timeout: config.timeout, version: VERSION });
        const source = createSource(http, config);

        getLogger().debug({ name: config.name, datatrackerUrl: config.datatrackerUrl }, 'Starting report');
        const report = await generateReport(config.name, source);
        getLogger().debug({ requests: http.getRequestCount() }, 'Report complete');

        printReport(report, config.verbose, stdout);
        return 0;
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        if (!(error instanceof ReportError)) {
            getLogger().debug({ err: error }, 'Unexpected failure');
        }
        stderr(`Error: ${message}\n`);
        return 1;
    } finally {
        http?.close();
    }
}

/**
 * Build the `rfc-roles` command.
 */
export function createProgram(deps: CommandDependencies = {}): Command {
    const setExitCode = deps.setExitCode ?? ((code: number) => {
        process.exitCode = code;
    });

    const program = new Command();

    program
        .name('rfc-roles')
        .description('Count the RFCs a person authored, shepherded, was responsible AD for, balloted on, or is acknowledged in.')
        .version(VERSION)
        .option('-n, --name <name>', 'Person to search for, e.g. "Firstname Lastname" (required)')
        .option('-v, --verbose', 'List the matching documents under each category')
        .option('-d, --debug', 'Print debug logs to stderr')
        .option('-i, --include <statuses>', 'Extra RFC statuses to count, comma separated (e.g. std,ds)', parseInclude)
        .option('--first-rfc <n>', 'Lowest RFC number counted in any category', parseNonNegativeInt)
        .option('--last-rfc <n>', 'Highest RFC number counted in any category', parseNonNegativeInt)
        .option('--datatracker-url <url>', 'Datatracker base URL')
        .option('--rfc-editor-url <url>', 'RFC Editor base URL')
        .option('--timeout <ms>', 'Per-request timeout in milliseconds', parsePositiveInt)
        .option('--page-size <n>', 'Records per Datatracker page', parsePositiveInt)
        .option('--json-logs', 'Output JSON logs')
        .action(async (opts: CliOptions) => {
            setExitCode(await runReportCommand(opts, deps));
        });

    return program;
}
