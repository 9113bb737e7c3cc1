/**
 * In-process similarity index.
 *
 * Keeps two logical collections, one document per workflow and one per component
 * (source table, target table, transformation), each embedded as a weighted sparse
 * term-frequency vector. Distance is 1 - cosine similarity. It stands in for an
 * external embedding store behind the SemanticIndex contract and is rebuilt from
 * the repository on every refresh.
 */
import { CandidateProvenance, SearchCandidate, WorkflowRecord } from '../models/workflow';
import { CandidateFilter, IndexStatus, SemanticIndex, provenanceAllowed } from './semanticIndex';

type SparseVector = ReadonlyMap<string, number>;

interface IndexedDocument {
  setId: string;
  workflowName: string;
  provenance: CandidateProvenance;
  componentName?: string;
  vector: SparseVector;
  norm: number;
}

export function tokenize(text: string): string[] {
  const lower = text.toLowerCase();
  const out: string[] = [];
  // whole identifiers (LOAD_CUSTOMERS) plus their parts (load, customers)
  for(const ident of lower.split(/[^a-z0-9_]+/)){
    if(!ident) continue;
    out.push(ident);
    if(ident.includes('_')){
      for(const part of ident.split('_')) if(part) out.push(part);
    }
  }
  return out;
}

// Labels and role words shared by every document; never indexed or queried.
const LABEL_WORDS = new Set(['workflow', 'description', 'status', 'set', 'session', 'mapping', 'source', 'target', 'table', 'transformation']);

// component name vs. its columns, schema and owning workflow
const COMPONENT_NAME_WEIGHT = 3;

interface WeightedText { text: string; weight: number }

function vectorize(...parts: WeightedText[]): { vector: SparseVector; norm: number } {
  const vector = new Map<string, number>();
  for(const { text, weight } of parts){
    for(const t of tokenize(text)){
      if(LABEL_WORDS.has(t)) continue;
      vector.set(t, (vector.get(t) ?? 0) + weight);
    }
  }
  let sq = 0;
  for(const v of vector.values()) sq += v * v;
  return { vector, norm: Math.sqrt(sq) };
}

function cosine(a: SparseVector, aNorm: number, b: SparseVector, bNorm: number): number {
  if(aNorm === 0 || bNorm === 0) return 0;
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for(const [term, weight] of small){
    const other = large.get(term);
    if(other !== undefined) dot += weight * other;
  }
  return dot / (aNorm * bNorm);
}

export function workflowDocument(wf: WorkflowRecord): string {
  const parts = [
    `Workflow: ${wf.name}`,
    `Description: ${wf.description ?? 'No description'}`,
    `Status: ${wf.status}`,
    `Set: ${wf.setId}`,
  ];
  for(const s of wf.sessions) parts.push(`Session ${s.name} mapping ${s.mappingName}`);
  for(const t of wf.sourceTables) parts.push(`Source table ${t.name}${t.schema ? ` ${t.schema}` : ''}${t.database ? ` ${t.database}` : ''}`);
  for(const t of wf.targetTables) parts.push(`Target table ${t.name}${t.schema ? ` ${t.schema}` : ''}${t.database ? ` ${t.database}` : ''}`);
  for(const t of wf.transformations) parts.push(`Transformation ${t.name} ${t.type}`);
  return parts.join('\n');
}

interface ComponentDocument { provenance: CandidateProvenance; componentName: string; context: string }

/** Context text per component; the name itself is weighted separately when indexed. */
function componentDocuments(wf: WorkflowRecord): ComponentDocument[] {
  const docs: ComponentDocument[] = [];
  for(const t of wf.sourceTables){
    docs.push({ provenance: 'source_table', componentName: t.name,
      context: [t.schema, t.database, t.connection, wf.name, ...t.columns.map(c => c.name)].filter(Boolean).join(' ') });
  }
  for(const t of wf.targetTables){
    docs.push({ provenance: 'target_table', componentName: t.name,
      context: [t.schema, t.database, t.connection, t.loadType, wf.name, ...t.columns.map(c => c.name)].filter(Boolean).join(' ') });
  }
  for(const t of wf.transformations){
    docs.push({ provenance: 'transformation', componentName: t.name,
      context: [t.type, t.expression, wf.name].filter(Boolean).join(' ') });
  }
  return docs;
}

export class TokenVectorIndex implements SemanticIndex {
  private docs: IndexedDocument[] = [];
  private state: IndexStatus = 'empty';

  async index(records: readonly WorkflowRecord[]): Promise<void> {
    const next: IndexedDocument[] = [];
    for(const wf of records){
      next.push({ setId: wf.setId, workflowName: wf.name, provenance: 'workflow', ...vectorize({ text: workflowDocument(wf), weight: 1 }) });
      for(const c of componentDocuments(wf)){
        const vec = vectorize({ text: c.componentName, weight: COMPONENT_NAME_WEIGHT }, { text: c.context, weight: 1 });
        next.push({ setId: wf.setId, workflowName: wf.name, provenance: c.provenance, componentName: c.componentName, ...vec });
      }
    }
    this.docs = next;
    this.state = 'ready';
  }

  async query(text: string, topK: number, filter?: CandidateFilter): Promise<SearchCandidate[]> {
    const q = vectorize({ text, weight: 1 });
    const scored: { doc: IndexedDocument; similarity: number; order: number }[] = [];
    this.docs.forEach((doc, order) => {
      if(!provenanceAllowed(doc.provenance, filter)) return;
      const similarity = cosine(q.vector, q.norm, doc.vector, doc.norm);
      if(similarity > 0) scored.push({ doc, similarity, order });
    });
    scored.sort((a, b) => (b.similarity - a.similarity) || (a.order - b.order));
    return scored.slice(0, Math.max(0, topK)).map(({ doc, similarity }) => ({
      ref: { setId: doc.setId, workflowName: doc.workflowName },
      distance: 1 - similarity,
      provenance: doc.provenance,
      componentName: doc.componentName,
    }));
  }

  status(): IndexStatus { return this.state; }

  size(): number { return this.docs.length; }
}
