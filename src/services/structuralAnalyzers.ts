// Structural analyzers: pure functions from a workflow component to issue strings.
// One malformed component must not abort analysis of the rest, so every entity is
// analyzed under its own guard.
import { Session, SourceTable, TargetTable, Transformation, WorkflowRecord } from '../models/workflow';
import { parseBooleanEnv } from '../utils/envUtils';
import { logWarn } from './logger';

const FAILED_RUN_STATES = ['failed', 'error'];
const HALT_PROPERTIES = ['error_threshold', 'stop_on_error', 'stop_on_errors'];
const SUSPICIOUS_TOKENS = ['error', 'null'];

const isBlank = (v: string | undefined) => !v || !v.trim();
const propertyKey = (k: string) => k.toLowerCase().trim().replace(/[^a-z0-9]+/g, '_');

/**
 * True for filter text that can never admit a row: numeric literal equalities between
 * different values (1=0), self-inequalities (1<>1) and a bare, unquoted `false`.
 */
export function isTriviallyFalse(expression: string): boolean {
  const s = expression.toLowerCase().replace(/\s*(<>|!=|=)\s*/g, '$1').trim();
  if(!s) return false;
  for(const m of s.matchAll(/(?<![\w.])(\d+)=(\d+)(?![\w.])/g)){
    if(Number(m[1]) !== Number(m[2])) return true;
  }
  if(/(?<![\w.])(\d+)(?:<>|!=)\1(?![\w.])/.test(s)) return true;
  return /(?<![\w'"])false(?![\w'"])/.test(s);
}

export function analyzeWorkflowStatus(wf: WorkflowRecord): string[] {
  return wf.status === 'active' ? [] : [`Workflow ${wf.name} status is ${wf.status}`];
}

export function analyzeSession(session: Session): string[] {
  const issues: string[] = [];
  if(!session.sourceConnections.length) issues.push(`Session ${session.name} has no source connections`);
  if(!session.targetConnections.length) issues.push(`Session ${session.name} has no target connections`);
  const run = session.lastRunStatus?.trim();
  if(run && FAILED_RUN_STATES.includes(run.toLowerCase())) issues.push(`Session ${session.name} last run status: ${run}`);
  for(const [name, value] of Object.entries(session.properties)){
    if(HALT_PROPERTIES.includes(propertyKey(name)) && parseBooleanEnv(value)){
      issues.push(`Session ${session.name} has ${name} set to ${value}`);
    }
  }
  return issues;
}

export function analyzeSourceTable(table: SourceTable): string[] {
  const issues: string[] = [];
  if(isBlank(table.connection)) issues.push(`Source table ${table.name} has no connection specified`);
  if(isBlank(table.schema) && isBlank(table.database)) issues.push(`Source table ${table.name} has no schema or database specified`);
  for(const f of table.filters){
    if(isTriviallyFalse(f)) issues.push(`Source table ${table.name} has filter that excludes all data: ${f}`);
  }
  return issues;
}

export function analyzeTargetTable(table: TargetTable): string[] {
  const issues: string[] = [];
  if(isBlank(table.connection)) issues.push(`Target table ${table.name} has no connection specified`);
  if(isBlank(table.schema) && isBlank(table.database)) issues.push(`Target table ${table.name} has no schema or database specified`);
  if(isBlank(table.loadType)) issues.push(`Target table ${table.name} has no load type specified`);
  return issues;
}

export function analyzeTransformation(t: Transformation): string[] {
  const issues: string[] = [];
  const expr = t.expression ?? '';
  if(t.type.trim().toLowerCase() === 'filter' && isTriviallyFalse(expr)){
    issues.push(`Filter transformation ${t.name} has expression that excludes all data`);
  }
  const lower = expr.toLowerCase();
  if(SUSPICIOUS_TOKENS.some(tok => lower.includes(tok))) issues.push(`Transformation ${t.name} has potentially problematic expression`);
  if(!t.inputPorts.length) issues.push(`Transformation ${t.name} has no input ports`);
  if(!t.outputPorts.length) issues.push(`Transformation ${t.name} has no output ports`);
  return issues;
}

function guarded<T extends { name: string }>(kind: string, entity: T, analyze: (e: T) => string[]): string[] {
  try {
    return analyze(entity);
  } catch(e){
    logWarn('analyzer_entity_skipped', { kind, name: entity.name, message: e instanceof Error ? e.message : String(e) });
    return [];
  }
}

/** Every analyzer over one workflow, in component order. Duplicates are kept. */
export function analyzeWorkflow(wf: WorkflowRecord): string[] {
  return [
    ...guarded('workflow', wf, analyzeWorkflowStatus),
    ...wf.sessions.flatMap(s => guarded('session', s, analyzeSession)),
    ...wf.sourceTables.flatMap(s => guarded('source_table', s, analyzeSourceTable)),
    ...wf.targetTables.flatMap(s => guarded('target_table', s, analyzeTargetTable)),
    ...wf.transformations.flatMap(s => guarded('transformation', s, analyzeTransformation)),
  ];
}
