import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { getToolRegistry } from './toolRegistry';

// Pre-dispatch check of params against each tool's published JSON Schema.
const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);
const cache = new Map<string, ValidateFunction | null>();

interface ValidationCounters { success: number; failure: number; unchecked: number }
const counters: ValidationCounters = { success: 0, failure: 0, unchecked: 0 };

function buildValidator(method: string): ValidateFunction | null {
  const entry = getToolRegistry().find(t => t.name === method);
  return entry ? ajv.compile(entry.inputSchema) : null;
}

export function validateParams(method: string, params: unknown): { ok: true } | { ok: false; errors: ErrorObject[] } {
  let validate = cache.get(method);
  if(validate === undefined){ validate = buildValidator(method); cache.set(method, validate); }
  if(!validate){ counters.unchecked++; return { ok: true }; } // no schema => accept
  if(validate(params === undefined || params === null ? {} : params)){
    counters.success++;
    return { ok: true };
  }
  counters.failure++;
  return { ok: false, errors: validate.errors ?? [] };
}

export function clearValidationCache(){ cache.clear(); }

export function getValidationMetrics(){ return { ...counters }; }
