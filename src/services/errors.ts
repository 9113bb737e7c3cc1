// Engine outcome kinds. The search and diagnostic core never throws to its callers;
// it returns one of these alongside (possibly empty) results.
export type OutcomeKind = 'ok' | 'not_found' | 'index_unavailable' | 'malformed_query';

// Rejections are counted and debug-logged, never surfaced in results.
export type RejectionReason = 'missing_from_repository' | 'below_threshold' | 'table_not_in_workflow';

export interface Outcome<T> {
  status: OutcomeKind;
  results: T[];
  reason?: string;
}

export const ok = <T>(results: T[]): Outcome<T> => ({ status: 'ok', results });
export const notFound = <T>(reason: string): Outcome<T> => ({ status: 'not_found', results: [], reason });
export const malformedQuery = <T>(reason: string): Outcome<T> => ({ status: 'malformed_query', results: [], reason });
export const indexUnavailable = <T>(reason: string, results: T[] = []): Outcome<T> => ({ status: 'index_unavailable', results, reason });

// JSON-RPC error helper for the handler layer. Plain object (not an Error subclass)
// so code/message/data survive wrapping layers unchanged.
export interface SemanticRpcErrorShape<TData extends Record<string, unknown> | undefined = Record<string, unknown>> {
  code: number;
  message: string;
  data: TData;
  __semantic: true;
}

export const INVALID_PARAMS = -32602;
export const METHOD_NOT_FOUND = -32601;

export function semanticError<TData extends Record<string, unknown>>(code: number, message: string, data?: TData): never {
  const err: SemanticRpcErrorShape<Record<string, unknown>> = { code, message, data: data ?? {}, __semantic: true };
  // eslint-disable-next-line no-throw-literal
  throw err;
}

export function isSemanticError(e: unknown): e is SemanticRpcErrorShape<Record<string, unknown>> {
  if(!e || typeof e !== 'object') return false;
  return '__semantic' in e && e.__semantic === true
    && 'code' in e && Number.isSafeInteger(e.code)
    && 'message' in e && typeof e.message === 'string';
}
