import { WorkflowRecord } from '../models/workflow';
import { DEFAULT_STRIP_PREFIXES } from '../config/runtimeConfig';

export function stripCommonPrefix(name: string, prefixes: readonly string[] = DEFAULT_STRIP_PREFIXES): string {
  const lower = name.toLowerCase();
  for(const p of prefixes){
    if(p && lower.startsWith(p)) return lower.slice(p.length);
  }
  return lower;
}

/**
 * Cheap sanity check applied to semantic candidates: case-insensitive equality,
 * containment in either direction, or equality once naming prefixes are removed.
 */
export function isReasonableMatch(query: string, name: string, prefixes: readonly string[] = DEFAULT_STRIP_PREFIXES): boolean {
  const q = query.toLowerCase();
  const n = name.toLowerCase();
  if(q === n) return true;
  if(n.includes(q) || q.includes(n)) return true;
  return stripCommonPrefix(q, prefixes) === stripCommonPrefix(n, prefixes);
}

export function workflowHasTable(wf: WorkflowRecord, table: string): boolean {
  const t = table.toLowerCase();
  return wf.sourceTables.some(s => s.name.toLowerCase() === t) || wf.targetTables.some(s => s.name.toLowerCase() === t);
}

export function tableRole(wf: WorkflowRecord, table: string): 'source' | 'target' | 'source+target' | undefined {
  const t = table.toLowerCase();
  const src = wf.sourceTables.some(s => s.name.toLowerCase() === t);
  const tgt = wf.targetTables.some(s => s.name.toLowerCase() === t);
  if(src && tgt) return 'source+target';
  if(tgt) return 'target';
  if(src) return 'source';
  return undefined;
}
