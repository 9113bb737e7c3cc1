export * from './models/workflow';
export * from './models/filters';
export { Outcome, OutcomeKind, RejectionReason } from './services/errors';
export { RepositorySnapshot, WorkflowRepository, WorkflowSets, ReplaceReport } from './services/workflowRepository';
export { SemanticIndex, SemanticIndexFactory, CandidateFilter, IndexStatus, rawScore } from './services/semanticIndex';
export { TokenVectorIndex, tokenize } from './services/tokenVectorIndex';
export { isReasonableMatch, stripCommonPrefix } from './services/matching';
export { CatalogView, SearchValidator, SearchValidatorOptions } from './services/searchValidator';
export { analyzeWorkflow, isTriviallyFalse } from './services/structuralAnalyzers';
export { Archetype, DEFAULT_ARCHETYPES, DiagnosticMatcher, matchesArchetype } from './services/diagnosticMatcher';
export { CatalogLoader, CatalogLoadResult, parseWorkflowSet } from './services/catalogLoader';
export { WorkflowCatalog, WorkflowCatalogOptions, CatalogStatistics, SearchHistoryEntry, getCatalog, setCatalog } from './services/catalogContext';
export { getRuntimeConfig, reloadRuntimeConfig, RuntimeConfig } from './config/runtimeConfig';
