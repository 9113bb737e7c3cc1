import { WorkflowRecord, refKey } from '../models/workflow';
import { logWarn } from './logger';

export type WorkflowSets = ReadonlyMap<string, readonly WorkflowRecord[]>;

export interface ReplaceReport {
  setId: string;
  accepted: number;
  duplicates: string[];
}

function deepFreeze<T>(value: T): T {
  if(value && typeof value === 'object' && !Object.isFrozen(value)){
    for(const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Immutable view of the catalog. Readers hold one of these for the duration of an
 * operation; writers never touch it after construction.
 */
export class RepositorySnapshot {
  private readonly byKey: ReadonlyMap<string, WorkflowRecord>;
  private readonly byLowerName: ReadonlyMap<string, readonly WorkflowRecord[]>;

  constructor(readonly sets: WorkflowSets, readonly version: number){
    const byKey = new Map<string, WorkflowRecord>();
    const byLowerName = new Map<string, WorkflowRecord[]>();
    for(const records of sets.values()){
      for(const r of records){
        byKey.set(refKey({ setId: r.setId, workflowName: r.name }), r);
        const lower = r.name.toLowerCase();
        const bucket = byLowerName.get(lower);
        if(bucket) bucket.push(r); else byLowerName.set(lower, [r]);
      }
    }
    this.byKey = byKey;
    this.byLowerName = byLowerName;
  }

  exists(setId: string, name: string): boolean { return this.byKey.has(refKey({ setId, workflowName: name })); }

  lookup(setId: string, name: string): WorkflowRecord | undefined { return this.byKey.get(refKey({ setId, workflowName: name })); }

  /** Case-insensitive exact name match across every set, in set insertion order. */
  findByName(name: string): readonly WorkflowRecord[] { return this.byLowerName.get(name.toLowerCase()) ?? []; }

  allSets(): string[] { return Array.from(this.sets.keys()); }

  *records(): IterableIterator<WorkflowRecord> {
    for(const records of this.sets.values()) yield* records;
  }

  count(): number { return this.byKey.size; }
}

const EMPTY: WorkflowSets = new Map();

/**
 * Authoritative store of workflow records grouped by source set. Every mutation builds
 * a fresh RepositorySnapshot and swaps the reference; records are frozen on entry.
 */
export class WorkflowRepository {
  private current: RepositorySnapshot;
  private version = 0;

  constructor(initial: WorkflowSets = EMPTY){
    this.current = new RepositorySnapshot(WorkflowRepository.normalizeAll(initial).sets, this.version);
  }

  snapshot(): RepositorySnapshot { return this.current; }

  /** Swap the records of a single set, leaving the other sets untouched. */
  replace(setId: string, records: readonly WorkflowRecord[]): ReplaceReport {
    const { records: normalized, report } = WorkflowRepository.normalizeSet(setId, records);
    const next = new Map(this.current.sets);
    next.set(setId, normalized);
    this.swap(next);
    return report;
  }

  /** Swap the entire catalog in one step. */
  replaceAll(sets: WorkflowSets): ReplaceReport[] {
    const { sets: next, reports } = WorkflowRepository.normalizeAll(sets);
    this.swap(next);
    return reports;
  }

  /** Install a snapshot prepared elsewhere (see WorkflowCatalog.refresh). */
  install(snapshot: RepositorySnapshot): void {
    this.version = Math.max(this.version, snapshot.version);
    this.current = snapshot;
  }

  exists(setId: string, name: string): boolean { return this.current.exists(setId, name); }
  lookup(setId: string, name: string): WorkflowRecord | undefined { return this.current.lookup(setId, name); }
  allSets(): string[] { return this.current.allSets(); }
  count(): number { return this.current.count(); }

  clear(): void { this.swap(new Map()); }

  /** Build (but do not install) the next snapshot for the given sets. */
  prepare(sets: WorkflowSets): { snapshot: RepositorySnapshot; reports: ReplaceReport[] } {
    const { sets: next, reports } = WorkflowRepository.normalizeAll(sets);
    return { snapshot: new RepositorySnapshot(next, this.version + 1), reports };
  }

  private swap(sets: WorkflowSets){
    this.version++;
    this.current = new RepositorySnapshot(sets, this.version);
  }

  private static normalizeAll(sets: WorkflowSets){
    const next = new Map<string, readonly WorkflowRecord[]>();
    const reports: ReplaceReport[] = [];
    for(const [setId, records] of sets){
      const { records: normalized, report } = WorkflowRepository.normalizeSet(setId, records);
      next.set(setId, normalized);
      reports.push(report);
    }
    return { sets: next, reports };
  }

  private static normalizeSet(setId: string, records: readonly WorkflowRecord[]){
    const seen = new Set<string>();
    const duplicates: string[] = [];
    const out: WorkflowRecord[] = [];
    for(const r of records){
      if(seen.has(r.name)){ duplicates.push(r.name); continue; }
      seen.add(r.name);
      out.push(deepFreeze(r.setId === setId ? r : { ...r, setId }));
    }
    if(duplicates.length) logWarn('repository_duplicate_names', { setId, duplicates });
    return { records: Object.freeze(out), report: { setId, accepted: out.length, duplicates } };
  }
}
