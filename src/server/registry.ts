// In-process handler registry used by the stdio transport. Every handler is wrapped
// with start/end/error logging and per-method timing metrics.
import { log, newCorrelationId } from '../services/logger';
import { isSemanticError } from '../services/errors';

export type Handler<TParams=unknown> = (params: TParams) => Promise<unknown> | unknown;

export interface MetricRecord { count: number; errors: number; totalMs: number; maxMs: number }
const handlers: Record<string, Handler> = {};
const metrics: Record<string, MetricRecord> = {};

function recordMetric(name: string, ms: number, failed: boolean){
  let rec = metrics[name];
  if(!rec){ rec = { count:0, errors:0, totalMs:0, maxMs:0 }; metrics[name] = rec; }
  rec.count++; rec.totalMs += ms; if(ms > rec.maxMs) rec.maxMs = ms;
  if(failed) rec.errors++;
}

function errorType(e: unknown): string {
  if(isSemanticError(e)) return `code_${e.code}`;
  return e instanceof Error ? e.name : 'error';
}

export function registerHandler(name: string, fn: Handler){
  const wrapped: Handler = async (params: unknown) => {
    const corr = newCorrelationId();
    const startNs = process.hrtime.bigint();
    log('debug','tool_start',{ tool: name, correlationId: corr });
    let failed = false;
    try {
      return await fn(params);
    } catch(e){
      failed = true;
      log('error','tool_error',{ tool: name, correlationId: corr, data: { type: errorType(e), message: e instanceof Error ? e.message : isSemanticError(e) ? e.message : String(e) } });
      throw e;
    } finally {
      const ms = Number(process.hrtime.bigint() - startNs)/1_000_000;
      recordMetric(name, ms, failed);
      log('info','tool_end',{ tool: name, correlationId: corr, ms: Math.round(ms * 1000) / 1000 });
    }
  };
  handlers[name] = wrapped;
}

export function getHandler(name: string): Handler | undefined {
  return handlers[name];
}

export function listRegisteredMethods(){
  return Object.keys(handlers).sort();
}

export function getMetricsRaw(): Readonly<Record<string, MetricRecord>> {
  return metrics;
}
