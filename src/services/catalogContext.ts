/**
 * Workflow catalog: owns the repository and the semantic index and swaps them
 * together. Writes are serialized through a promise chain; reads capture the
 * current { snapshot, index } pair once and never observe a half-applied refresh.
 */
import { DiagnosticsConfig, SearchConfig, getRuntimeConfig } from '../config/runtimeConfig';
import { WorkflowFilter } from '../models/filters';
import { ComponentKind, ComponentMatch, DiagnosticReport, SearchResult, WorkflowRecord } from '../models/workflow';
import { CatalogLoader } from './catalogLoader';
import { Archetype, DEFAULT_ARCHETYPES, DiagnosticMatcher } from './diagnosticMatcher';
import { Outcome, OutcomeKind, RejectionReason } from './errors';
import { logInfo, logWarn } from './logger';
import { CatalogView, SearchValidator } from './searchValidator';
import { IndexStatus, SemanticIndexFactory } from './semanticIndex';
import { TokenVectorIndex } from './tokenVectorIndex';
import { ReplaceReport, WorkflowRepository, WorkflowSets } from './workflowRepository';

export interface SearchHistoryEntry {
  ts: string;
  operation: string;
  query: string;
  status: OutcomeKind;
  resultCount: number;
}

export interface CatalogStatistics {
  recordCount: number;
  setCount: number;
  sets: string[];
  version: number;
  indexStatus: IndexStatus;
  searchCount: number;
  indexFailures: number;
  rejectedCandidates: Record<RejectionReason, number>;
  lastRefreshedAt?: string;
}

export interface RefreshReport {
  version: number;
  sets: ReplaceReport[];
  indexStatus: IndexStatus;
  ms: number;
}

export interface IngestReport extends RefreshReport {
  dir: string;
  errors: { file: string; error: string }[];
  hash: string;
}

export interface WorkflowCatalogOptions {
  indexFactory?: SemanticIndexFactory;
  search?: SearchConfig;
  diagnostics?: DiagnosticsConfig;
  archetypes?: readonly Archetype[];
}

export class WorkflowCatalog {
  private readonly repo = new WorkflowRepository();
  private readonly indexFactory: SemanticIndexFactory;
  private readonly validator: SearchValidator;
  private readonly matcher: DiagnosticMatcher;
  private readonly historyLimit?: number;
  private view: CatalogView;
  private indexStatus: IndexStatus = 'empty';
  private writer: Promise<void> = Promise.resolve();
  private history: SearchHistoryEntry[] = [];
  private searchCount = 0;
  private indexFailures = 0;
  private rejected: Record<RejectionReason, number> = { missing_from_repository: 0, below_threshold: 0, table_not_in_workflow: 0 };
  private lastRefreshedAt?: string;

  constructor(options: WorkflowCatalogOptions = {}){
    this.indexFactory = options.indexFactory ?? (() => new TokenVectorIndex());
    this.historyLimit = options.search?.historySize;
    this.validator = new SearchValidator({
      search: options.search,
      onIndexFailure: () => { this.indexFailures++; },
      onRejected: reason => { this.rejected[reason]++; },
    });
    this.matcher = new DiagnosticMatcher(this.validator, options.archetypes ?? DEFAULT_ARCHETYPES, options.diagnostics);
    this.view = { snapshot: this.repo.snapshot() };
  }

  /** The pair a single read operation should use from start to finish. */
  currentView(): CatalogView { return this.view; }

  refresh(sets: WorkflowSets): Promise<RefreshReport> {
    return this.serialize(() => this.applyRefresh(sets));
  }

  /** Replace one set, keeping every other set as it is. */
  refreshSet(setId: string, records: readonly WorkflowRecord[]): Promise<RefreshReport> {
    return this.serialize(() => {
      const next = new Map(this.view.snapshot.sets);
      next.set(setId, records);
      return this.applyRefresh(next);
    });
  }

  ingestDirectory(dir: string = getRuntimeConfig().catalog.baseDir): Promise<IngestReport> {
    return this.serialize(async () => {
      const loaded = new CatalogLoader(dir).load();
      const report = await this.applyRefresh(loaded.sets);
      logInfo('catalog_ingested', { dir, sets: loaded.summary.accepted, skipped: loaded.summary.skipped, workflows: loaded.summary.workflows });
      return { ...report, dir, errors: loaded.errors, hash: loaded.hash };
    });
  }

  clear(): Promise<RefreshReport> {
    return this.refresh(new Map());
  }

  getStatistics(): CatalogStatistics {
    const { snapshot } = this.view;
    return {
      recordCount: snapshot.count(),
      setCount: snapshot.allSets().length,
      sets: snapshot.allSets(),
      version: snapshot.version,
      indexStatus: this.indexStatus,
      searchCount: this.searchCount,
      indexFailures: this.indexFailures,
      rejectedCandidates: { ...this.rejected },
      lastRefreshedAt: this.lastRefreshedAt,
    };
  }

  /** Most recent first. */
  getSearchHistory(limit?: number): SearchHistoryEntry[] {
    const recent = this.history.slice().reverse();
    return limit === undefined ? recent : recent.slice(0, Math.max(0, limit));
  }

  getWorkflow(setId: string, name: string): WorkflowRecord | undefined {
    return this.view.snapshot.lookup(setId, name);
  }

  async searchByName(name: string, exactRequired = true): Promise<Outcome<SearchResult>> {
    const out = await this.validator.searchByName(this.view, name, exactRequired);
    return this.track('searchByName', name, out);
  }

  async searchTableWorkflows(tableName: string): Promise<Outcome<SearchResult>> {
    const out = await this.validator.searchTableWorkflows(this.view, tableName);
    return this.track('searchTableWorkflows', tableName, out);
  }

  async searchWithFilters(query: string, filters: readonly WorkflowFilter[]): Promise<Outcome<SearchResult>> {
    const out = await this.validator.searchWithFilters(this.view, query, filters);
    return this.track('searchWithFilters', query, out);
  }

  async searchComponents(name: string, kind?: ComponentKind): Promise<Outcome<ComponentMatch>> {
    const out = await this.validator.searchComponents(this.view, name, kind);
    return this.track('searchComponents', name, out);
  }

  findDependents(workflowName: string): WorkflowRecord[] {
    return this.validator.findDependents(this.view, workflowName);
  }

  analyzeTable(tableName: string, description = ''): Promise<DiagnosticReport> {
    return this.matcher.analyzeTable(this.view, tableName, description);
  }

  diagnoseWorkflow(workflowName: string, description = ''): Promise<DiagnosticReport> {
    return this.matcher.diagnoseWorkflow(this.view, workflowName, description);
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writer.then(task);
    this.writer = run.then(() => undefined, () => undefined);
    return run;
  }

  private async applyRefresh(sets: WorkflowSets): Promise<RefreshReport> {
    const started = Date.now();
    const { snapshot, reports } = this.repo.prepare(sets);
    const index = this.indexFactory();
    let indexStatus: IndexStatus;
    try {
      await index.index(Array.from(snapshot.records()));
      indexStatus = index.status();
    } catch(e){
      indexStatus = 'failed';
      this.indexFailures++;
      logWarn('semantic_index_build_failed', { version: snapshot.version, message: e instanceof Error ? e.message : String(e) });
    }
    // both references move together
    this.repo.install(snapshot);
    this.view = indexStatus === 'failed' ? { snapshot } : { snapshot, index };
    this.indexStatus = indexStatus;
    this.lastRefreshedAt = new Date().toISOString();
    const ms = Date.now() - started;
    logInfo('catalog_refreshed', { version: snapshot.version, records: snapshot.count(), sets: snapshot.allSets().length, indexStatus, ms });
    return { version: snapshot.version, sets: reports, indexStatus, ms };
  }

  private track<T>(operation: string, query: string, out: Outcome<T>): Outcome<T> {
    this.searchCount++;
    const limit = this.historyLimit ?? getRuntimeConfig().search.historySize;
    if(limit > 0){
      this.history.push({ ts: new Date().toISOString(), operation, query, status: out.status, resultCount: out.results.length });
      if(this.history.length > limit) this.history.splice(0, this.history.length - limit);
    }
    return out;
  }
}

let catalog: WorkflowCatalog | undefined;

export function getCatalog(): WorkflowCatalog {
  if(!catalog) catalog = new WorkflowCatalog();
  return catalog;
}

/** Swap the process-wide catalog (tests, embedding hosts). */
export function setCatalog(next: WorkflowCatalog): WorkflowCatalog {
  catalog = next;
  return next;
}
