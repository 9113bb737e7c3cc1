import { z } from 'zod';
import { getToolRegistry, ToolRegistryEntry } from './toolRegistry';

/**
 * Zod validators per tool. Handlers parse their params through these for typed
 * access; the JSON Schemas in the base registry remain the external contract.
 */

const zEmpty = z.object({}).strict();
const zTopK = z.number().int().min(1).max(200);
const zKind = z.enum(['source_table','target_table','transformation']);

export const zFilter = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('status_equals'), status: z.enum(['active','inactive','error','unknown']) }).strict(),
  z.object({ kind: z.literal('set_equals'), setId: z.string().min(1) }).strict(),
  z.object({ kind: z.literal('has_source_table'), table: z.string().min(1) }).strict(),
  z.object({ kind: z.literal('has_target_table'), table: z.string().min(1) }).strict(),
  z.object({ kind: z.literal('session_count'), min: z.number().int().min(0).optional(), max: z.number().int().min(0).optional() }).strict(),
]);

// Blank names are accepted here: the engine answers them with malformed_query.
export const zWorkflowSearch = z.object({ name: z.string(), exact: z.boolean().optional(), limit: zTopK.optional() }).strict();
export const zWorkflowSearchFiltered = z.object({ query: z.string(), filters: z.array(zFilter).max(20).optional(), limit: zTopK.optional() }).strict();
export const zWorkflowGet = z.object({ setId: z.string().min(1), name: z.string().min(1) }).strict();
export const zWorkflowDependents = z.object({ name: z.string().min(1) }).strict();
export const zWorkflowDiagnose = z.object({ name: z.string(), description: z.string().optional() }).strict();
export const zTableWorkflows = z.object({ table: z.string() }).strict();
export const zTableAnalyze = z.object({ table: z.string(), description: z.string().optional() }).strict();
export const zComponentSearch = z.object({ name: z.string(), kind: zKind.optional() }).strict();
export const zCatalogRefresh = z.object({ dir: z.string().min(1).optional() }).strict();
export const zCatalogStats = z.object({ historyLimit: z.number().int().min(0).max(1000).optional() }).strict();

const zodMap: Record<string, z.ZodTypeAny> = {
  'workflow/search': zWorkflowSearch,
  'workflow/searchFiltered': zWorkflowSearchFiltered,
  'workflow/get': zWorkflowGet,
  'workflow/dependents': zWorkflowDependents,
  'workflow/diagnose': zWorkflowDiagnose,
  'table/workflows': zTableWorkflows,
  'table/analyze': zTableAnalyze,
  'component/search': zComponentSearch,
  'catalog/refresh': zCatalogRefresh,
  'catalog/stats': zCatalogStats,
  'meta/tools': zEmpty,
};

export function getZodEnhancedRegistry(): ToolRegistryEntry[] {
  return getToolRegistry().map(e => {
    const zodSchema = zodMap[e.name];
    return zodSchema ? { ...e, zodSchema } : e;
  });
}
