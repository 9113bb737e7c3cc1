import { WorkflowRecord, WorkflowStatus } from './workflow';

export type WorkflowFilter =
  | { kind: 'status_equals'; status: WorkflowStatus }
  | { kind: 'set_equals'; setId: string }
  | { kind: 'has_source_table'; table: string }
  | { kind: 'has_target_table'; table: string }
  | { kind: 'session_count'; min?: number; max?: number };

const sameName = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();

export function matchesFilter(wf: WorkflowRecord, filter: WorkflowFilter): boolean {
  switch(filter.kind){
    case 'status_equals': return wf.status === filter.status;
    case 'set_equals': return wf.setId === filter.setId;
    case 'has_source_table': return wf.sourceTables.some(t => sameName(t.name, filter.table));
    case 'has_target_table': return wf.targetTables.some(t => sameName(t.name, filter.table));
    case 'session_count': {
      const n = wf.sessions.length;
      if(filter.min !== undefined && n < filter.min) return false;
      if(filter.max !== undefined && n > filter.max) return false;
      return true;
    }
  }
}

export function matchesAllFilters(wf: WorkflowRecord, filters: readonly WorkflowFilter[]): boolean {
  return filters.every(f => matchesFilter(wf, f));
}
