import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import Ajv from 'ajv';
// date-time format on timestamps
import addFormats from 'ajv-formats';
import schema from '../../schemas/workflowSet.schema.json';
import { ColumnDescriptor, Session, SourceTable, TargetTable, Transformation, WorkflowRecord, WorkflowStatus } from '../models/workflow';
import { logDebug, logWarn } from './logger';

type Scalar = string | number | boolean;

interface RawColumn { name: string; dataType?: string; nullable?: boolean }
interface RawSourceTable { name: string; schema?: string; database?: string; connection?: string; columns?: RawColumn[]; filters?: string[] }
interface RawTargetTable { name: string; schema?: string; database?: string; connection?: string; columns?: RawColumn[]; loadType?: string }
interface RawTransformation { name: string; type: string; inputPorts?: string[]; outputPorts?: string[]; expression?: string; properties?: Record<string, Scalar> }
interface RawSession {
  name: string; workflowName?: string; mappingName?: string;
  sourceConnections?: string[]; targetConnections?: string[];
  lastRunStatus?: string; lastRunAt?: string; properties?: Record<string, Scalar>;
}
interface RawWorkflow {
  name: string; status?: WorkflowStatus; description?: string; createdAt?: string; modifiedAt?: string;
  sessions?: RawSession[]; sourceTables?: RawSourceTable[]; targetTables?: RawTargetTable[];
  transformations?: RawTransformation[]; metadata?: Record<string, Scalar>; dependencies?: string[];
}
export interface RawWorkflowSet { workflows: RawWorkflow[] }

export interface CatalogLoadResult {
  sets: Map<string, WorkflowRecord[]>;
  errors: { file: string; error: string }[];
  hash: string; // combined catalog hash
  summary: { scanned: number; accepted: number; skipped: number; workflows: number };
}

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);
const validateSet = ajv.compile<RawWorkflowSet>(schema);

const stringMap = (m: Record<string, Scalar> | undefined): Record<string, string> =>
  Object.fromEntries(Object.entries(m ?? {}).map(([k, v]) => [k, String(v)]));
const columns = (c: RawColumn[] | undefined): ColumnDescriptor[] => (c ?? []).map(x => ({ ...x }));

/** Fill defaults so every record satisfies the canonical model. */
export function toWorkflowRecord(setId: string, raw: RawWorkflow): WorkflowRecord {
  const sessions: Session[] = (raw.sessions ?? []).map(s => ({
    name: s.name,
    workflowName: s.workflowName ?? raw.name,
    mappingName: s.mappingName ?? '',
    sourceConnections: s.sourceConnections ?? [],
    targetConnections: s.targetConnections ?? [],
    lastRunStatus: s.lastRunStatus,
    lastRunAt: s.lastRunAt,
    properties: stringMap(s.properties),
  }));
  const sourceTables: SourceTable[] = (raw.sourceTables ?? []).map(t => ({
    name: t.name, schema: t.schema, database: t.database, connection: t.connection,
    columns: columns(t.columns), filters: t.filters ?? [],
  }));
  const targetTables: TargetTable[] = (raw.targetTables ?? []).map(t => ({
    name: t.name, schema: t.schema, database: t.database, connection: t.connection,
    columns: columns(t.columns), loadType: t.loadType,
  }));
  const transformations: Transformation[] = (raw.transformations ?? []).map(t => ({
    name: t.name, type: t.type, inputPorts: t.inputPorts ?? [], outputPorts: t.outputPorts ?? [],
    expression: t.expression, properties: stringMap(t.properties),
  }));
  return {
    setId,
    name: raw.name,
    status: raw.status ?? 'unknown',
    description: raw.description,
    createdAt: raw.createdAt,
    modifiedAt: raw.modifiedAt,
    sessions, sourceTables, targetTables, transformations,
    metadata: stringMap(raw.metadata),
    dependencies: raw.dependencies ?? [],
  };
}

export function parseWorkflowSet(setId: string, data: unknown): { records: WorkflowRecord[] } | { error: string } {
  if(!validateSet(data)){
    const detail = (validateSet.errors ?? []).slice(0, 5).map(e => `${e.instancePath || '/'} ${e.message ?? 'invalid'}`).join('; ');
    return { error: `schema: ${detail}` };
  }
  return { records: data.workflows.map(w => toWorkflowRecord(setId, w)) };
}

/**
 * Reads canonical workflow-set files (`<setId>.json`) from a directory. Invalid files
 * are reported and skipped; they never abort the load.
 */
export class CatalogLoader {
  constructor(private readonly baseDir: string){}

  load(): CatalogLoadResult {
    const dir = path.resolve(this.baseDir);
    const sets = new Map<string, WorkflowRecord[]>();
    const errors: { file: string; error: string }[] = [];
    const hash = crypto.createHash('sha256');
    if(!fs.existsSync(dir)){
      return { sets, errors: [{ file: dir, error: 'missing directory' }], hash: '', summary: { scanned: 0, accepted: 0, skipped: 0, workflows: 0 } };
    }
    const files = fs.readdirSync(dir).filter(f => f.endsWith('.json')).sort();
    let workflows = 0;
    for(const f of files){
      const setId = path.basename(f, '.json');
      let data: unknown;
      let text: string;
      try {
        text = fs.readFileSync(path.join(dir, f), 'utf8');
        data = JSON.parse(text);
      } catch(e){
        errors.push({ file: f, error: e instanceof Error ? e.message : String(e) });
        continue;
      }
      const parsed = parseWorkflowSet(setId, data);
      if('error' in parsed){ errors.push({ file: f, error: parsed.error }); continue; }
      sets.set(setId, parsed.records);
      workflows += parsed.records.length;
      hash.update(`${setId}:`, 'utf8').update(text, 'utf8');
      logDebug('catalog_set_loaded', { setId, workflows: parsed.records.length });
    }
    if(errors.length) logWarn('catalog_load_errors', { dir, errors });
    return { sets, errors, hash: hash.digest('hex'), summary: { scanned: files.length, accepted: sets.size, skipped: errors.length, workflows } };
  }
}
