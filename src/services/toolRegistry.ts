/**
 * Tool registry.
 * Per-method metadata with JSON Schema for params, so clients can introspect the
 * surface through meta/tools and validate before calling.
 */
import type { ZodTypeAny } from 'zod';

export interface ToolRegistryEntry {
  name: string;                 // JSON-RPC method name
  description: string;
  mutation: boolean;            // replaces catalog state
  inputSchema: object;          // always an object schema
  zodSchema?: ZodTypeAny;       // attached by toolRegistry.zod
}

const str = { type: 'string', minLength: 1 };
const topK = { type: 'integer', minimum: 1, maximum: 200 };
const kind = { type: 'string', enum: ['source_table','target_table','transformation'] };

const filterSchema = { oneOf: [
  { type: 'object', additionalProperties: false, required: ['kind','status'], properties: { kind: { const: 'status_equals' }, status: { type: 'string', enum: ['active','inactive','error','unknown'] } } },
  { type: 'object', additionalProperties: false, required: ['kind','setId'], properties: { kind: { const: 'set_equals' }, setId: str } },
  { type: 'object', additionalProperties: false, required: ['kind','table'], properties: { kind: { const: 'has_source_table' }, table: str } },
  { type: 'object', additionalProperties: false, required: ['kind','table'], properties: { kind: { const: 'has_target_table' }, table: str } },
  { type: 'object', additionalProperties: false, required: ['kind'], properties: { kind: { const: 'session_count' }, min: { type: 'integer', minimum: 0 }, max: { type: 'integer', minimum: 0 } } },
] };

const INPUT_SCHEMAS: Record<string, object> = {
  'workflow/search': { type: 'object', additionalProperties: false, required: ['name'], properties: { name: { type: 'string' }, exact: { type: 'boolean' }, limit: topK } },
  'workflow/searchFiltered': { type: 'object', additionalProperties: false, required: ['query'], properties: { query: { type: 'string' }, filters: { type: 'array', maxItems: 20, items: filterSchema }, limit: topK } },
  'workflow/get': { type: 'object', additionalProperties: false, required: ['setId','name'], properties: { setId: str, name: str } },
  'workflow/dependents': { type: 'object', additionalProperties: false, required: ['name'], properties: { name: str } },
  'workflow/diagnose': { type: 'object', additionalProperties: false, required: ['name'], properties: { name: { type: 'string' }, description: { type: 'string' } } },
  'table/workflows': { type: 'object', additionalProperties: false, required: ['table'], properties: { table: { type: 'string' } } },
  'table/analyze': { type: 'object', additionalProperties: false, required: ['table'], properties: { table: { type: 'string' }, description: { type: 'string' } } },
  'component/search': { type: 'object', additionalProperties: false, required: ['name'], properties: { name: { type: 'string' }, kind } },
  'catalog/refresh': { type: 'object', additionalProperties: false, properties: { dir: str } },
  'catalog/stats': { type: 'object', additionalProperties: false, properties: { historyLimit: { type: 'integer', minimum: 0, maximum: 1000 } } },
  'meta/tools': { type: 'object', additionalProperties: false, properties: {} },
};

const MUTATION = new Set(['catalog/refresh']);

const DESCRIPTIONS: Record<string, string> = {
  'workflow/search': 'Find workflows by name; exact matches first, validated semantic matches otherwise.',
  'workflow/searchFiltered': 'Fuzzy name search narrowed by structured filters (status, set, tables, session count).',
  'workflow/get': 'Return one workflow record by set id and name.',
  'workflow/dependents': 'List workflows that declare a dependency on, or read a table produced by, the named workflow.',
  'workflow/diagnose': 'Structural diagnostics and recommendations for a single workflow.',
  'table/workflows': 'Workflows that read or load the named table, verified against the repository.',
  'table/analyze': 'Diagnose why a table is empty or wrong using the workflows responsible for it.',
  'component/search': 'Search source tables, target tables and transformations by name.',
  'catalog/refresh': 'Reload workflow sets from disk and rebuild the semantic index.',
  'catalog/stats': 'Catalog statistics and recent search history.',
  'meta/tools': 'Enumerate available tools and their metadata.',
};

export function getToolRegistry(): ToolRegistryEntry[] {
  return Object.keys(INPUT_SCHEMAS).sort().map(name => ({
    name,
    description: DESCRIPTIONS[name] ?? 'Tool description pending.',
    mutation: MUTATION.has(name),
    inputSchema: INPUT_SCHEMAS[name] ?? { type: 'object' },
  }));
}

export const REGISTRY_VERSION = '2026-10-01';
