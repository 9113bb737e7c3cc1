/**
 * Search validation engine.
 *
 * Reconciles exact lookups against the repository snapshot with candidates from
 * the semantic index. The index is an untrusted oracle: every candidate is
 * re-checked against the snapshot before it can become a SearchResult, so a
 * stale or over-eager index can lower recall but never introduce a workflow
 * that does not exist.
 *
 * Every operation takes a CatalogView captured once by the caller, which keeps
 * the snapshot consistent even if a refresh lands mid-search.
 */
import { getRuntimeConfig, SearchConfig } from '../config/runtimeConfig';
import { WorkflowFilter, matchesAllFilters } from '../models/filters';
import { ComponentKind, ComponentMatch, SearchCandidate, SearchResult, WorkflowRecord, refKey } from '../models/workflow';
import { Outcome, RejectionReason, indexUnavailable, malformedQuery, notFound, ok } from './errors';
import { logDebug, logWarn } from './logger';
import { isReasonableMatch, tableRole } from './matching';
import { CandidateFilter, SemanticIndex, rawScore } from './semanticIndex';
import { RepositorySnapshot } from './workflowRepository';

export interface CatalogView {
  readonly snapshot: RepositorySnapshot;
  readonly index?: SemanticIndex;
}

export interface SearchValidatorOptions {
  /** Fixed tunables; defaults to the live runtime config. */
  search?: SearchConfig;
  onIndexFailure?: (operation: string, error: unknown) => void;
  onRejected?: (reason: RejectionReason) => void;
}

type QueryAttempt = { ok: true; candidates: SearchCandidate[] } | { ok: false; error: unknown };

export const GUIDANCE = {
  blankName: 'A workflow name is required',
  blankTable: 'A table name is required',
  noWorkflow: 'No workflow matched the name; verify the spelling or search without exact matching',
  noTable: 'No workflows found that load or read this table',
  noComponent: 'No components matched the name',
  indexDown: 'Semantic index unavailable; only exact name matches can be served',
} as const;

class SemanticTimeoutError extends Error {
  constructor(ms: number){ super(`semantic index query exceeded ${ms}ms`); this.name = 'SemanticTimeoutError'; }
}

export class SearchValidator {
  constructor(private readonly options: SearchValidatorOptions = {}){}

  private cfg(): SearchConfig { return this.options.search ?? getRuntimeConfig().search; }

  private reject(reason: RejectionReason, detail: Record<string, unknown>){
    this.options.onRejected?.(reason);
    logDebug('search_candidate_rejected', { reason, ...detail });
  }

  /** Linear, case-insensitive exact name scan. Cannot return a workflow absent from the snapshot. */
  exactNameSearch(snapshot: RepositorySnapshot, name: string): SearchResult[] {
    return snapshot.findByName(name.trim()).map(wf => ({
      workflow: wf,
      confidence: 1,
      matchReason: `Exact name match in ${wf.setId}`,
      setId: wf.setId,
    }));
  }

  async searchByName(view: CatalogView, name: string, exactRequired = true): Promise<Outcome<SearchResult>> {
    const query = name.trim();
    if(!query) return malformedQuery(GUIDANCE.blankName);
    const exact = this.exactNameSearch(view.snapshot, query);
    if(exactRequired && exact.length) return ok(exact);

    const cfg = this.cfg();
    const attempt = await this.querySemantic(view, query, cfg.nameTopK, { scope: 'workflows' });
    // degrade to the exact path alone
    if(!attempt.ok) return this.indexFailed('searchByName', attempt.error, exact);

    const best = new Map<string, SearchResult>();
    for(const c of attempt.candidates){
      const wf = view.snapshot.lookup(c.ref.setId, c.ref.workflowName);
      if(!wf){ this.reject('missing_from_repository', { ref: c.ref }); continue; }
      const reasonable = isReasonableMatch(query, wf.name, cfg.stripPrefixes);
      const confidence = reasonable ? rawScore(c.distance) : rawScore(c.distance) * cfg.unreasonablePenalty;
      if(confidence <= cfg.minConfidence){ this.reject('below_threshold', { ref: c.ref, confidence }); continue; }
      const key = refKey(c.ref);
      const prev = best.get(key);
      if(prev && prev.confidence >= confidence) continue;
      best.set(key, {
        workflow: wf,
        confidence,
        matchReason: reasonable ? `Semantic match in ${wf.setId}` : `Weak semantic match in ${wf.setId}; name differs from query`,
        setId: wf.setId,
      });
    }
    const results = sortByConfidence(Array.from(best.values()));
    return results.length ? ok(results) : notFound(GUIDANCE.noWorkflow);
  }

  async searchTableWorkflows(view: CatalogView, tableName: string): Promise<Outcome<SearchResult>> {
    const table = tableName.trim();
    if(!table) return malformedQuery(GUIDANCE.blankTable);
    const cfg = this.cfg();
    const [targets, sources] = await Promise.all([
      this.querySemantic(view, `target table ${table}`, cfg.tableTopK, { scope: 'components', kinds: ['target_table'] }),
      this.querySemantic(view, `source table ${table}`, cfg.tableTopK, { scope: 'components', kinds: ['source_table'] }),
    ]);
    if(!targets.ok) return this.indexFailed('searchTableWorkflows', targets.error);
    if(!sources.ok) return this.indexFailed('searchTableWorkflows', sources.error);

    // union, keeping the strongest candidate per workflow
    const best = new Map<string, { candidate: SearchCandidate; confidence: number }>();
    for(const c of [...targets.candidates, ...sources.candidates]){
      const key = refKey(c.ref);
      const confidence = rawScore(c.distance);
      const prev = best.get(key);
      if(!prev || confidence > prev.confidence) best.set(key, { candidate: c, confidence });
    }

    const results: SearchResult[] = [];
    for(const { candidate, confidence } of best.values()){
      const wf = view.snapshot.lookup(candidate.ref.setId, candidate.ref.workflowName);
      if(!wf){ this.reject('missing_from_repository', { ref: candidate.ref }); continue; }
      const role = tableRole(wf, table);
      if(!role){ this.reject('table_not_in_workflow', { ref: candidate.ref, table }); continue; }
      results.push({ workflow: wf, confidence, matchReason: `Table '${table}' found as ${role} table in ${wf.setId}`, setId: wf.setId });
    }
    const sorted = sortByConfidence(results);
    return sorted.length ? ok(sorted) : notFound(GUIDANCE.noTable);
  }

  /**
   * Workflows that depend on `workflowName`: those declaring it as a dependency, or
   * reading a table it writes. Descriptive only, so cycles are not detected.
   */
  findDependents(view: CatalogView, workflowName: string): WorkflowRecord[] {
    const target = workflowName.trim().toLowerCase();
    if(!target) return [];
    const produced = new Set<string>();
    for(const wf of view.snapshot.records()){
      if(wf.name.toLowerCase() === target) for(const t of wf.targetTables) produced.add(t.name.toLowerCase());
    }
    const out: WorkflowRecord[] = [];
    for(const wf of view.snapshot.records()){
      if(wf.name.toLowerCase() === target) continue;
      const declared = wf.dependencies.some(d => d.toLowerCase() === target);
      const reads = wf.sourceTables.some(t => produced.has(t.name.toLowerCase()));
      if(declared || reads) out.push(wf);
    }
    return out;
  }

  async searchWithFilters(view: CatalogView, query: string, filters: readonly WorkflowFilter[]): Promise<Outcome<SearchResult>> {
    const base = await this.searchByName(view, query, false);
    const results = base.results.filter(r => matchesAllFilters(r.workflow, filters));
    if(base.status === 'index_unavailable') return indexUnavailable(GUIDANCE.indexDown, results);
    if(base.status !== 'ok') return base;
    return results.length ? ok(results) : notFound(GUIDANCE.noWorkflow);
  }

  async searchComponents(view: CatalogView, name: string, kind?: ComponentKind): Promise<Outcome<ComponentMatch>> {
    const query = name.trim();
    if(!query) return malformedQuery('A component name is required');
    const filter: CandidateFilter = { scope: 'components', kinds: kind ? [kind] : undefined };
    const attempt = await this.querySemantic(view, query, this.cfg().componentTopK, filter);
    if(!attempt.ok) return this.indexFailed('searchComponents', attempt.error);
    const best = new Map<string, ComponentMatch>();
    for(const c of attempt.candidates){
      if(c.provenance === 'workflow' || !c.componentName) continue;
      const wf = view.snapshot.lookup(c.ref.setId, c.ref.workflowName);
      if(!wf || !componentExists(wf, c.provenance, c.componentName)){ this.reject('missing_from_repository', { ref: c.ref, component: c.componentName }); continue; }
      const match: ComponentMatch = { setId: wf.setId, workflowName: wf.name, componentName: c.componentName, kind: c.provenance, confidence: rawScore(c.distance) };
      const key = `${refKey(c.ref)}\u0000${c.provenance}\u0000${c.componentName}`;
      const prev = best.get(key);
      if(!prev || match.confidence > prev.confidence) best.set(key, match);
    }
    const results = sortByConfidence(Array.from(best.values()));
    return results.length ? ok(results) : notFound(GUIDANCE.noComponent);
  }

  /** Reports one index failure for the operation and degrades to `results`. */
  private indexFailed<T>(operation: string, error: unknown, results: T[] = []): Outcome<T> {
    logWarn('semantic_index_unavailable', { operation, message: error instanceof Error ? error.message : String(error) });
    this.options.onIndexFailure?.(operation, error);
    return indexUnavailable(GUIDANCE.indexDown, results);
  }

  private async querySemantic(view: CatalogView, text: string, topK: number, filter: CandidateFilter): Promise<QueryAttempt> {
    const index = view.index;
    if(!index || index.status() !== 'ready'){
      return { ok: false, error: new Error(`semantic index ${index ? index.status() : 'absent'}`) };
    }
    const timeoutMs = this.cfg().semanticTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    let timedOut = false;
    try {
      const timeout = new Promise<never>((_, rejectTimeout) => {
        timer = setTimeout(() => { timedOut = true; rejectTimeout(new SemanticTimeoutError(timeoutMs)); }, timeoutMs);
      });
      const pending = index.query(text, topK, filter);
      // a query that loses the race may still reject later; its result is discarded
      pending.catch(late => {
        if(timedOut) logDebug('semantic_query_discarded', { text, message: late instanceof Error ? late.message : String(late) });
      });
      const candidates = await Promise.race([pending, timeout]);
      return { ok: true, candidates };
    } catch(error){
      return { ok: false, error };
    } finally {
      if(timer) clearTimeout(timer);
    }
  }
}

function componentExists(wf: WorkflowRecord, kind: ComponentKind, name: string): boolean {
  switch(kind){
    case 'source_table': return wf.sourceTables.some(t => t.name === name);
    case 'target_table': return wf.targetTables.some(t => t.name === name);
    case 'transformation': return wf.transformations.some(t => t.name === name);
  }
}

/** Stable descending sort; ties keep index order. */
export function sortByConfidence<T extends { confidence: number }>(items: T[]): T[] {
  return items
    .map((item, i) => ({ item, i }))
    .sort((a, b) => (b.item.confidence - a.item.confidence) || (a.i - b.i))
    .map(x => x.item);
}
