/**
 * Workflow catalog tool handlers.
 *
 * Every handler parses its params through the tool's Zod schema and reads the
 * process-wide catalog. Engine outcomes (not_found, index_unavailable,
 * malformed_query) are results, not errors; only bad params and unknown records
 * surface as JSON-RPC errors.
 */
import { z } from 'zod';
import { registerHandler, getMetricsRaw, listRegisteredMethods } from '../server/registry';
import { getCatalog } from './catalogContext';
import { INVALID_PARAMS, semanticError } from './errors';
import { getToolRegistry, REGISTRY_VERSION } from './toolRegistry';
import {
  zCatalogRefresh, zCatalogStats, zComponentSearch, zTableAnalyze, zTableWorkflows,
  zWorkflowDependents, zWorkflowDiagnose, zWorkflowGet, zWorkflowSearch, zWorkflowSearchFiltered,
} from './toolRegistry.zod';
import { getValidationMetrics } from './validationService';

const NOT_FOUND = -32004;

export function parseParams<S extends z.ZodTypeAny>(method: string, schema: S, params: unknown): z.infer<S> {
  const parsed = schema.safeParse(params ?? {});
  if(!parsed.success){
    return semanticError(INVALID_PARAMS, 'Invalid params', {
      method,
      issues: parsed.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return parsed.data;
}

const limited = <T>(items: T[], limit?: number) => limit === undefined ? items : items.slice(0, limit);

registerHandler('workflow/search', async (params) => {
  const p = parseParams('workflow/search', zWorkflowSearch, params);
  const out = await getCatalog().searchByName(p.name, p.exact ?? true);
  return { ...out, results: limited(out.results, p.limit) };
});

registerHandler('workflow/searchFiltered', async (params) => {
  const p = parseParams('workflow/searchFiltered', zWorkflowSearchFiltered, params);
  const out = await getCatalog().searchWithFilters(p.query, p.filters ?? []);
  return { ...out, results: limited(out.results, p.limit) };
});

registerHandler('workflow/get', (params) => {
  const p = parseParams('workflow/get', zWorkflowGet, params);
  const workflow = getCatalog().getWorkflow(p.setId, p.name);
  if(!workflow) return semanticError(NOT_FOUND, 'Workflow not found', { setId: p.setId, name: p.name });
  return { workflow };
});

registerHandler('workflow/dependents', (params) => {
  const p = parseParams('workflow/dependents', zWorkflowDependents, params);
  const dependents = getCatalog().findDependents(p.name).map(wf => ({ setId: wf.setId, name: wf.name, status: wf.status }));
  return { workflow: p.name, count: dependents.length, dependents };
});

registerHandler('workflow/diagnose', (params) => {
  const p = parseParams('workflow/diagnose', zWorkflowDiagnose, params);
  return getCatalog().diagnoseWorkflow(p.name, p.description ?? '');
});

registerHandler('table/workflows', (params) => {
  const p = parseParams('table/workflows', zTableWorkflows, params);
  return getCatalog().searchTableWorkflows(p.table);
});

registerHandler('table/analyze', (params) => {
  const p = parseParams('table/analyze', zTableAnalyze, params);
  return getCatalog().analyzeTable(p.table, p.description ?? '');
});

registerHandler('component/search', (params) => {
  const p = parseParams('component/search', zComponentSearch, params);
  return getCatalog().searchComponents(p.name, p.kind);
});

registerHandler('catalog/refresh', async (params) => {
  const p = parseParams('catalog/refresh', zCatalogRefresh, params);
  const report = await getCatalog().ingestDirectory(p.dir);
  return {
    dir: report.dir,
    version: report.version,
    indexStatus: report.indexStatus,
    hash: report.hash,
    sets: report.sets,
    errors: report.errors,
    ms: report.ms,
  };
});

registerHandler('catalog/stats', (params) => {
  const p = parseParams('catalog/stats', zCatalogStats, params);
  const catalog = getCatalog();
  return {
    ...catalog.getStatistics(),
    history: catalog.getSearchHistory(p.historyLimit ?? 20),
    methods: getMetricsRaw(),
    validation: getValidationMetrics(),
  };
});

registerHandler('meta/tools', () => {
  const registered = new Set(listRegisteredMethods());
  return {
    registryVersion: REGISTRY_VERSION,
    tools: getToolRegistry().filter(t => registered.has(t.name)),
  };
});
