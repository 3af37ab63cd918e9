/**
 * Barrel export for all shared types.
 */
export { ROLE_CATEGORIES, ROLE_LABELS } from './role.js';
export type { RoleCategory, RoleResults } from './role.js';
export type { CategoryResult, Report } from './report.js';
export type { RoleSource } from './source.js';
export { DEFAULT_CONFIG, STD_LEVELS, STD_LEVEL_NAMES, findStdLevel } from './config.js';
export type { ReportConfig, LogLevel, StdLevel } from './config.js';
