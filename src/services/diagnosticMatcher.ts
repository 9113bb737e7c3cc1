/**
 * Diagnostic pattern matcher.
 *
 * Turns structural defects found in the workflows responsible for a table (or in a
 * single workflow) into an ordered, deduplicated list of recommendations, and
 * scores how much evidence backs the report:
 *
 *   confidence = 0.3 (any workflow) + min(0.4, 0.1 * issues) + min(0.3, 0.1 * archetype matches)
 */
import { z } from 'zod';
import archetypeData from '../data/diagnosticArchetypes.json';
import { DiagnosticsConfig, getRuntimeConfig } from '../config/runtimeConfig';
import { DiagnosticReport, SearchResult } from '../models/workflow';
import { logInfo } from './logger';
import { CatalogView, SearchValidator } from './searchValidator';
import { analyzeWorkflow } from './structuralAnalyzers';

const ArchetypeSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  keywords: z.array(z.string().min(1)),
  commonCauses: z.array(z.string().min(1)),
  debuggingSteps: z.array(z.string()),
  solutions: z.array(z.string()),
});

export type Archetype = z.infer<typeof ArchetypeSchema>;

export const DEFAULT_ARCHETYPES: readonly Archetype[] = z.array(ArchetypeSchema).parse(archetypeData.archetypes);

// Category advice keyed by the first matching substring of an issue.
const CATEGORY_ADVICE: ReadonlyArray<{ triggers: string[]; advice: string }> = [
  { triggers: ['connection'], advice: 'Check and fix database connections' },
  { triggers: ['status'], advice: 'Verify workflow and session status' },
  { triggers: ['filter'], advice: 'Review and correct filter expressions' },
  { triggers: ['transformation'], advice: 'Check transformation logic and expressions' },
  { triggers: ['schema', 'database'], advice: 'Verify schema and database configurations' },
];

export const GENERAL_ADVICE = [
  'Check session logs for detailed error messages',
  'Verify source data availability and quality',
  'Test database connections manually',
  'Review workflow schedule and dependencies',
  'Check system resources and performance',
] as const;

export const TABLE_NOT_FOUND_GUIDANCE = [
  'Verify the table name is correct',
  'Check if workflows exist in other sets',
  'Confirm the table is actually a source or target table in any workflow',
] as const;

export const WORKFLOW_NOT_FOUND_GUIDANCE = [
  'Verify the workflow name is correct',
  'Search without exact matching to list similarly named workflows',
] as const;

export const INDEX_UNAVAILABLE_GUIDANCE = 'The semantic index is unavailable; retry after the catalog has been re-indexed';

/** Lower-cased substring test of `text` against the archetype name, keywords and common causes. */
export function matchesArchetype(text: string, archetype: Archetype): boolean {
  const lower = text.toLowerCase().trim();
  if(!lower) return false;
  const triggers = [archetype.name, ...archetype.keywords, ...archetype.commonCauses];
  return triggers.some(t => lower.includes(t.toLowerCase()));
}

/**
 * One entry per archetype the description matches, plus one per archetype any issue
 * matches, so an archetype supported by both counts twice.
 */
export function matchArchetypes(description: string, issues: readonly string[], archetypes: readonly Archetype[]): Archetype[] {
  const matches: Archetype[] = [];
  for(const a of archetypes){
    if(matchesArchetype(description, a)) matches.push(a);
    if(issues.some(i => matchesArchetype(i, a))) matches.push(a);
  }
  return matches;
}

export function categoryAdvice(issue: string): string | undefined {
  const lower = issue.toLowerCase();
  return CATEGORY_ADVICE.find(c => c.triggers.some(t => lower.includes(t)))?.advice;
}

export function synthesizeRecommendations(issues: readonly string[], matches: readonly Archetype[], limit: number): string[] {
  const all: string[] = [];
  for(const a of matches) all.push(...a.solutions);
  for(const issue of issues){
    const advice = categoryAdvice(issue);
    if(advice) all.push(advice);
  }
  all.push(...GENERAL_ADVICE);
  return Array.from(new Set(all)).slice(0, limit);
}

export function computeConfidence(workflowCount: number, issueCount: number, matchCount: number): number {
  let score = 0;
  if(workflowCount > 0) score += 0.3;
  score += Math.min(0.4, issueCount * 0.1);
  score += Math.min(0.3, matchCount * 0.1);
  return Math.min(1, Math.max(0, score));
}

export class DiagnosticMatcher {
  constructor(
    private readonly validator: SearchValidator,
    private readonly archetypes: readonly Archetype[] = DEFAULT_ARCHETYPES,
    private readonly config?: DiagnosticsConfig,
  ){}

  private limit(): number { return (this.config ?? getRuntimeConfig().diagnostics).maxRecommendations; }

  async analyzeTable(view: CatalogView, tableName: string, description = ''): Promise<DiagnosticReport> {
    const found = await this.validator.searchTableWorkflows(view, tableName);
    if(!found.results.length){
      const guidance: string[] = found.status === 'index_unavailable' ? [INDEX_UNAVAILABLE_GUIDANCE, ...TABLE_NOT_FOUND_GUIDANCE] : [...TABLE_NOT_FOUND_GUIDANCE];
      return { target: tableName, targetKind: 'table', responsibleWorkflows: [], issues: [], recommendations: guidance, confidence: 0 };
    }
    const report = this.buildReport(tableName, 'table', found.results, description);
    logInfo('diagnostics_table_analyzed', { table: tableName, workflows: found.results.length, issues: report.issues.length, confidence: report.confidence });
    return report;
  }

  async diagnoseWorkflow(view: CatalogView, workflowName: string, description = ''): Promise<DiagnosticReport> {
    const found = await this.validator.searchByName(view, workflowName, true);
    const best = found.results[0];
    if(!best){
      const guidance: string[] = found.status === 'index_unavailable' ? [INDEX_UNAVAILABLE_GUIDANCE, ...WORKFLOW_NOT_FOUND_GUIDANCE] : [...WORKFLOW_NOT_FOUND_GUIDANCE];
      return { target: workflowName, targetKind: 'workflow', responsibleWorkflows: [], issues: [], recommendations: guidance, confidence: 0 };
    }
    const report = this.buildReport(workflowName, 'workflow', [best], description);
    logInfo('diagnostics_workflow_analyzed', { workflow: best.workflow.name, setId: best.setId, issues: report.issues.length, confidence: report.confidence });
    return report;
  }

  private buildReport(target: string, targetKind: DiagnosticReport['targetKind'], workflows: readonly SearchResult[], description: string): DiagnosticReport {
    // set semantics; insertion order keeps output deterministic
    const issues = Array.from(new Set(workflows.flatMap(r => analyzeWorkflow(r.workflow))));
    const matches = matchArchetypes(description, issues, this.archetypes);
    return {
      target,
      targetKind,
      responsibleWorkflows: workflows,
      issues,
      recommendations: synthesizeRecommendations(issues, matches, this.limit()),
      confidence: computeConfidence(workflows.length, issues.length, matches.length),
    };
  }
}
