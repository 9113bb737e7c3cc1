/**
 * Unified runtime configuration loader.
 *
 * Provides a single parsed, typed surface for environment driven behavior so
 * search tunables, logging and catalog location are not read ad hoc across
 * services and tests. Call reloadRuntimeConfig() after mutating process.env.
 */
import path from 'path';
import { getBooleanEnv, getCsvEnv, getNumberEnv } from '../utils/envUtils';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

interface LoggingConfig {
  level: LogLevel;
  json: boolean;
  file?: string;
}

interface CatalogConfig {
  baseDir: string;
  loadOnStart: boolean;
}

export interface SearchConfig {
  /** Candidates at or below this confidence are dropped. */
  minConfidence: number;
  /** Factor applied to candidates failing the reasonable-match check. */
  unreasonablePenalty: number;
  nameTopK: number;
  tableTopK: number;
  componentTopK: number;
  semanticTimeoutMs: number;
  /** Lower-case prefixes stripped before name comparison. */
  stripPrefixes: string[];
  historySize: number;
}

export interface DiagnosticsConfig {
  maxRecommendations: number;
}

export interface RuntimeConfig {
  profile: string;
  catalog: CatalogConfig;
  search: SearchConfig;
  diagnostics: DiagnosticsConfig;
  logging: LoggingConfig;
}

export const DEFAULT_STRIP_PREFIXES = ['wf_', 'workflow_', 'mapping_', 'm_', 's_'];

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

function parseLogLevel(): LogLevel {
  const raw = (process.env.WORKFLOW_LOG_LEVEL || '').toLowerCase().trim();
  const found = LEVELS.find(l => l === raw);
  return found ?? 'info';
}

function parseLoggingConfig(): LoggingConfig {
  const file = process.env.WORKFLOW_LOG_FILE;
  return {
    level: parseLogLevel(),
    json: getBooleanEnv('WORKFLOW_LOG_JSON'),
    file: file && file.trim() ? path.resolve(file.trim()) : undefined,
  };
}

function parseCatalogConfig(): CatalogConfig {
  const raw = process.env.WORKFLOW_CATALOG_DIR;
  return {
    baseDir: raw && raw.trim() ? path.resolve(raw.trim()) : path.join(process.cwd(), 'catalog'),
    loadOnStart: getBooleanEnv('WORKFLOW_CATALOG_LOAD_ON_START', true),
  };
}

function parseSearchConfig(): SearchConfig {
  return {
    minConfidence: getNumberEnv('WORKFLOW_SEARCH_MIN_CONFIDENCE', 0.3, 0, 1),
    unreasonablePenalty: getNumberEnv('WORKFLOW_SEARCH_PENALTY', 0.5, 0, 1),
    nameTopK: Math.floor(getNumberEnv('WORKFLOW_SEARCH_TOP_K', 10, 1, 200)),
    tableTopK: Math.floor(getNumberEnv('WORKFLOW_TABLE_TOP_K', 20, 1, 200)),
    componentTopK: Math.floor(getNumberEnv('WORKFLOW_COMPONENT_TOP_K', 20, 1, 200)),
    semanticTimeoutMs: Math.floor(getNumberEnv('WORKFLOW_SEMANTIC_TIMEOUT_MS', 2000, 1)),
    stripPrefixes: getCsvEnv('WORKFLOW_STRIP_PREFIXES', DEFAULT_STRIP_PREFIXES).map(p => p.toLowerCase()),
    historySize: Math.floor(getNumberEnv('WORKFLOW_SEARCH_HISTORY', 100, 0)),
  };
}

export function loadRuntimeConfig(): RuntimeConfig {
  return {
    profile: process.env.WORKFLOW_PROFILE || 'default',
    catalog: parseCatalogConfig(),
    search: parseSearchConfig(),
    diagnostics: { maxRecommendations: Math.floor(getNumberEnv('WORKFLOW_MAX_RECOMMENDATIONS', 10, 1, 100)) },
    logging: parseLoggingConfig(),
  };
}

let _cached: RuntimeConfig | undefined;
export function getRuntimeConfig(): RuntimeConfig {
  if(!_cached) _cached = loadRuntimeConfig();
  return _cached;
}

export function reloadRuntimeConfig(): RuntimeConfig {
  _cached = loadRuntimeConfig();
  return _cached;
}
