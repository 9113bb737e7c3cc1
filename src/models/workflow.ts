export type WorkflowStatus = 'active' | 'inactive' | 'error' | 'unknown';
export type ComponentKind = 'source_table' | 'target_table' | 'transformation';
export type CandidateProvenance = 'workflow' | ComponentKind;

export interface ColumnDescriptor {
  readonly name: string;
  readonly dataType?: string;
  readonly nullable?: boolean;
}

export interface SourceTable {
  readonly name: string;
  readonly schema?: string;
  readonly database?: string;
  readonly connection?: string;
  readonly columns: readonly ColumnDescriptor[];
  readonly filters: readonly string[];
}

export interface TargetTable {
  readonly name: string;
  readonly schema?: string;
  readonly database?: string;
  readonly connection?: string;
  readonly columns: readonly ColumnDescriptor[];
  readonly loadType?: string; // insert | update | upsert | truncate-insert ...
}

export interface Transformation {
  readonly name: string;
  readonly type: string;
  readonly inputPorts: readonly string[];
  readonly outputPorts: readonly string[];
  readonly expression?: string;
  readonly properties: Readonly<Record<string, string>>;
}

export interface Session {
  readonly name: string;
  readonly workflowName: string;
  readonly mappingName: string;
  readonly sourceConnections: readonly string[];
  readonly targetConnections: readonly string[];
  readonly lastRunStatus?: string;
  readonly lastRunAt?: string;
  readonly properties: Readonly<Record<string, string>>;
}

/** Canonical workflow record as produced by ingestion. Identity is (setId, name). */
export interface WorkflowRecord {
  readonly setId: string;
  readonly name: string;
  readonly status: WorkflowStatus;
  readonly description?: string;
  readonly createdAt?: string;
  readonly modifiedAt?: string;
  readonly sessions: readonly Session[];
  readonly sourceTables: readonly SourceTable[];
  readonly targetTables: readonly TargetTable[];
  readonly transformations: readonly Transformation[];
  readonly metadata: Readonly<Record<string, string>>;
  readonly dependencies: readonly string[];
}

export interface WorkflowRef { readonly setId: string; readonly workflowName: string }

export function refKey(ref: WorkflowRef): string { return `${ref.setId}\u0000${ref.workflowName}`; }

/** Raw nearest-neighbour hit from the semantic index. Never persisted, never trusted. */
export interface SearchCandidate {
  readonly ref: WorkflowRef;
  readonly distance: number;
  readonly provenance: CandidateProvenance;
  readonly componentName?: string;
}

export interface SearchResult {
  readonly workflow: WorkflowRecord;
  readonly confidence: number; // [0,1]
  readonly matchReason: string;
  readonly setId: string;
}

export interface ComponentMatch {
  readonly setId: string;
  readonly workflowName: string;
  readonly componentName: string;
  readonly kind: ComponentKind;
  readonly confidence: number;
}

export type DiagnosticTargetKind = 'table' | 'workflow';

export interface DiagnosticReport {
  readonly target: string;
  readonly targetKind: DiagnosticTargetKind;
  readonly responsibleWorkflows: readonly SearchResult[];
  readonly issues: readonly string[];
  readonly recommendations: readonly string[];
  readonly confidence: number; // [0,1]
}
