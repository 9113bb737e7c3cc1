import { CandidateProvenance, ComponentKind, SearchCandidate, WorkflowRecord } from '../models/workflow';

export type IndexStatus = 'empty' | 'ready' | 'failed';

/** Restricts a query to workflow documents or to one or more component kinds. */
export type CandidateFilter =
  | { scope: 'workflows' }
  | { scope: 'components'; kinds?: readonly ComponentKind[] };

/**
 * Similarity backend contract. Implementations are treated as untrusted oracles:
 * results may reference records that no longer exist and ranking may be arbitrary.
 */
export interface SemanticIndex {
  /** Full rebuild. Calling twice with the same records must behave like calling once. */
  index(records: readonly WorkflowRecord[]): Promise<void>;
  /** Candidates ordered by ascending distance. */
  query(text: string, topK: number, filter?: CandidateFilter): Promise<SearchCandidate[]>;
  status(): IndexStatus;
}

export type SemanticIndexFactory = () => SemanticIndex;

/** Similarity distance mapped to a raw score. */
export function rawScore(distance: number): number {
  if(!Number.isFinite(distance)) return 0;
  return Math.min(1, Math.max(0, 1 - distance));
}

export function provenanceAllowed(provenance: CandidateProvenance, filter?: CandidateFilter): boolean {
  if(!filter) return true;
  if(filter.scope === 'workflows') return provenance === 'workflow';
  if(provenance === 'workflow') return false;
  return !filter.kinds || filter.kinds.includes(provenance);
}
