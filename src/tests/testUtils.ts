import { DEFAULT_STRIP_PREFIXES, SearchConfig } from '../config/runtimeConfig';
import { SearchCandidate, Session, SourceTable, TargetTable, Transformation, WorkflowRecord } from '../models/workflow';
import { CatalogView } from '../services/searchValidator';
import { CandidateFilter, IndexStatus, SemanticIndex, provenanceAllowed } from '../services/semanticIndex';
import { TokenVectorIndex } from '../services/tokenVectorIndex';
import { WorkflowRepository } from '../services/workflowRepository';

export const TEST_SEARCH: SearchConfig = {
  minConfidence: 0.3,
  unreasonablePenalty: 0.5,
  nameTopK: 10,
  tableTopK: 20,
  componentTopK: 20,
  semanticTimeoutMs: 50,
  stripPrefixes: [...DEFAULT_STRIP_PREFIXES],
  historySize: 100,
};

// Builders default to a healthy component so analyzers report nothing unless a test says otherwise.
export function sourceTable(name: string, overrides: Partial<SourceTable> = {}): SourceTable {
  return { name, schema: 'stage', connection: 'SRC_DB', columns: [], filters: [], ...overrides };
}

export function targetTable(name: string, overrides: Partial<TargetTable> = {}): TargetTable {
  return { name, schema: 'dw', connection: 'DW_DB', loadType: 'insert', columns: [], ...overrides };
}

export function session(name: string, workflowName: string, overrides: Partial<Session> = {}): Session {
  return { name, workflowName, mappingName: `m_${workflowName.toLowerCase()}`, sourceConnections: ['SRC_DB'], targetConnections: ['DW_DB'], properties: {}, ...overrides };
}

export function transformation(name: string, type: string, overrides: Partial<Transformation> = {}): Transformation {
  return { name, type, inputPorts: ['in'], outputPorts: ['out'], properties: {}, ...overrides };
}

export function workflow(setId: string, name: string, overrides: Partial<WorkflowRecord> = {}): WorkflowRecord {
  return {
    setId, name, status: 'active',
    sessions: [], sourceTables: [], targetTables: [], transformations: [],
    metadata: {}, dependencies: [],
    ...overrides,
  };
}

/** Group records into sets keyed by their setId, preserving first-seen set order. */
export function setsOf(...records: WorkflowRecord[]): Map<string, WorkflowRecord[]> {
  const sets = new Map<string, WorkflowRecord[]>();
  for(const r of records){
    const bucket = sets.get(r.setId);
    if(bucket) bucket.push(r); else sets.set(r.setId, [r]);
  }
  return sets;
}

/** Snapshot of `records` paired with an index built over them (TokenVectorIndex unless given). */
export async function viewOf(records: WorkflowRecord[], index: SemanticIndex | null = new TokenVectorIndex()): Promise<CatalogView> {
  const repo = new WorkflowRepository(setsOf(...records));
  const snapshot = repo.snapshot();
  if(!index) return { snapshot };
  await index.index(Array.from(snapshot.records()));
  return { snapshot, index };
}

/** Answers every query with a fixed candidate list (filtered by provenance), whatever the repository holds. */
export class ScriptedIndex implements SemanticIndex {
  queries: { text: string; topK: number; filter?: CandidateFilter }[] = [];
  constructor(private readonly candidates: SearchCandidate[]){}
  async index(): Promise<void> { /* scripted answers ignore the records */ }
  async query(text: string, topK: number, filter?: CandidateFilter): Promise<SearchCandidate[]> {
    this.queries.push({ text, topK, filter });
    return this.candidates.filter(c => provenanceAllowed(c.provenance, filter)).slice(0, topK);
  }
  status(): IndexStatus { return 'ready'; }
}

export class FailingIndex implements SemanticIndex {
  calls = 0;
  constructor(private readonly failOn: 'query' | 'index' = 'query'){}
  async index(): Promise<void> {
    if(this.failOn === 'index') throw new Error('vector store offline');
  }
  async query(): Promise<SearchCandidate[]> {
    this.calls++;
    throw new Error('vector store offline');
  }
  status(): IndexStatus { return 'ready'; }
}

export class SlowIndex implements SemanticIndex {
  constructor(private readonly delayMs: number, private readonly candidates: SearchCandidate[] = []){}
  async index(): Promise<void> { /* nothing to build */ }
  query(): Promise<SearchCandidate[]> {
    return new Promise(resolve => setTimeout(() => resolve(this.candidates), this.delayMs));
  }
  status(): IndexStatus { return 'ready'; }
}

/** Rejects every query after `delayMs`. */
export class LateFailingIndex implements SemanticIndex {
  constructor(private readonly delayMs: number){}
  async index(): Promise<void> { /* nothing to build */ }
  query(): Promise<SearchCandidate[]> {
    return new Promise((_, reject) => setTimeout(() => reject(new Error('vector store offline')), this.delayMs));
  }
  status(): IndexStatus { return 'ready'; }
}

export function candidate(setId: string, workflowName: string, distance: number, provenance: SearchCandidate['provenance'] = 'workflow', componentName?: string): SearchCandidate {
  return { ref: { setId, workflowName }, distance, provenance, componentName };
}
