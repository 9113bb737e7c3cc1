/**
 * stdio transport: line-delimited JSON-RPC 2.0.
 *
 * One request per input line, one response per output line. Notifications (no id)
 * are executed but never answered. stdout carries protocol frames only; all
 * diagnostics go through the logger to stderr.
 */
import { createInterface } from 'readline';
import { getHandler, listRegisteredMethods } from './registry';
import { INVALID_PARAMS, METHOD_NOT_FOUND, isSemanticError } from '../services/errors';
import { log } from '../services/logger';
import { validateParams } from '../services/validationService';

type RpcId = string | number | null;

interface JsonRpcRequest {
  jsonrpc: '2.0';
  id?: RpcId;
  method: string;
  params?: unknown;
}
interface JsonRpcSuccess { jsonrpc: '2.0'; id: RpcId; result: unknown }
interface JsonRpcError { jsonrpc: '2.0'; id: RpcId; error: { code: number; message: string; data?: unknown } }
export type JsonRpcResponse = JsonRpcSuccess | JsonRpcError;

const PARSE_ERROR = -32700;
const INVALID_REQUEST = -32600;
const INTERNAL_ERROR = -32603;

function makeError(id: RpcId | undefined, code: number, message: string, data?: unknown): JsonRpcError {
  return { jsonrpc: '2.0', id: id ?? null, error: { code, message, data } };
}

function isRpcId(v: unknown): v is RpcId {
  return v === null || typeof v === 'string' || typeof v === 'number';
}

function toRequest(value: unknown): JsonRpcRequest | undefined {
  if(!value || typeof value !== 'object' || Array.isArray(value)) return undefined;
  if(!('jsonrpc' in value) || value.jsonrpc !== '2.0') return undefined;
  if(!('method' in value) || typeof value.method !== 'string' || !value.method) return undefined;
  const id = 'id' in value ? value.id : undefined;
  if(id !== undefined && !isRpcId(id)) return undefined;
  return { jsonrpc: '2.0', id, method: value.method, params: 'params' in value ? value.params : undefined };
}

function requestId(value: unknown): RpcId {
  if(value && typeof value === 'object' && 'id' in value && isRpcId(value.id)) return value.id;
  return null;
}

/**
 * Handle one raw input line. Resolves to the response to write, or undefined for
 * blank lines and notifications.
 */
export async function dispatchLine(line: string): Promise<JsonRpcResponse | undefined> {
  const trimmed = line.trim();
  if(!trimmed) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    log('warn', 'parse_error', { data: { raw: trimmed.slice(0, 200) } });
    return makeError(null, PARSE_ERROR, 'Parse error');
  }
  const req = toRequest(parsed);
  if(!req) return makeError(requestId(parsed), INVALID_REQUEST, 'Invalid Request');
  const notification = req.id === undefined;
  const reply = (res: JsonRpcResponse) => notification ? undefined : res;

  const handler = getHandler(req.method);
  if(!handler){
    log('debug', 'method_not_found', { data: { requested: req.method } });
    return reply(makeError(req.id, METHOD_NOT_FOUND, 'Method not found', { method: req.method, available: listRegisteredMethods() }));
  }
  const validation = validateParams(req.method, req.params);
  if(!validation.ok){
    return reply(makeError(req.id, INVALID_PARAMS, 'Invalid params', { method: req.method, errors: validation.errors }));
  }
  try {
    const result = await handler(req.params ?? {});
    return reply({ jsonrpc: '2.0', id: req.id ?? null, result });
  } catch(e){
    if(isSemanticError(e)) return reply(makeError(req.id, e.code, e.message, e.data));
    return reply(makeError(req.id, INTERNAL_ERROR, 'Internal error', { message: e instanceof Error ? e.message : String(e) }));
  }
}

export interface TransportOptions {
  input?: NodeJS.ReadableStream;        // defaults to process.stdin
  output?: NodeJS.WritableStream;       // defaults to process.stdout
}

/** Start reading requests. Resolves when the input stream closes and every pending response is written. */
export function startTransport(opts: TransportOptions = {}): Promise<void> {
  const output = opts.output ?? process.stdout;
  // no output on the interface: request lines must not be echoed to stdout
  const rl = createInterface({ input: opts.input ?? process.stdin });
  const pending = new Set<Promise<void>>();
  rl.on('line', (line: string) => {
    const task = dispatchLine(line)
      .then(res => { if(res) output.write(JSON.stringify(res) + '\n'); })
      .catch(e => log('error', 'dispatch_failure', { data: { message: e instanceof Error ? e.message : String(e) } }))
      .finally(() => { pending.delete(task); });
    pending.add(task);
  });
  return new Promise(resolve => {
    rl.on('close', () => {
      Promise.all(Array.from(pending)).then(() => resolve(), () => resolve());
    });
  });
}
