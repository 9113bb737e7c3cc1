import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { getRuntimeConfig, LogLevel } from '../config/runtimeConfig';

export interface LogRecord {
  ts: string; // ISO timestamp
  level: LogLevel;
  evt: string; // short event key
  msg?: string;
  tool?: string;
  ms?: number;
  data?: unknown;
  correlationId?: string;
}

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

// Correlation id helper (one per incoming request)
export function newCorrelationId(){ return crypto.randomBytes(8).toString('hex'); }

let logFileHandle: fs.WriteStream | null = null;
let logFilePath: string | undefined;

function loggingCfg(){
  return getRuntimeConfig().logging;
}

function initializeFileLogging(file: string): void {
  if (logFileHandle && logFilePath === file) return;
  try {
    const logDir = path.dirname(file);
    if (!fs.existsSync(logDir)) fs.mkdirSync(logDir, { recursive: true });
    logFileHandle = fs.createWriteStream(file, { flags: 'a', encoding: 'utf8' });
    logFilePath = file;
    logFileHandle.write(`\n=== Workflow Index Session Started: ${new Date().toISOString()} ===\n`);
    process.on('exit', () => {
      if (logFileHandle && !logFileHandle.destroyed) logFileHandle.end();
    });
  } catch (error) {
    // stderr remains the primary sink
    console.error(`[logger] Failed to initialize file logging to ${file}: ${error}`);
    logFileHandle = null;
  }
}

export function formatRecord(rec: LogRecord, json: boolean): string {
  if(json) return JSON.stringify(rec);
  const parts = [rec.ts, rec.level.toUpperCase(), rec.evt, rec.msg||''];
  if(rec.tool) parts.push(`[${rec.tool}]`);
  if(rec.ms !== undefined) parts.push(`${rec.ms}ms`);
  if(rec.data !== undefined) parts.push(JSON.stringify(rec.data));
  return parts.filter(Boolean).join(' ');
}

function emit(rec: LogRecord){
  const cfg = loggingCfg();
  if(LEVEL_RANK[rec.level] > LEVEL_RANK[cfg.level]) return;
  if (cfg.file) initializeFileLogging(cfg.file);
  const logLine = formatRecord(rec, cfg.json);
  // stdout is reserved for the JSON-RPC channel
  console.error(logLine);
  if (cfg.file && logFileHandle && !logFileHandle.destroyed) {
    logFileHandle.write(logLine + '\n');
  }
}

export function log(level: LogLevel, evt: string, fields: Omit<LogRecord,'level'|'evt'|'ts'> = {}){
  emit({ ts: new Date().toISOString(), level, evt, ...fields });
}

export const logDebug = (evt:string, f?:unknown)=> log('debug', evt, { data:f });
export const logInfo = (evt:string, f?:unknown)=> log('info', evt, { data:f });
export const logWarn = (evt:string, f?:unknown)=> log('warn', evt, { data:f });
export const logError = (evt:string, f?:unknown)=> log('error', evt, { data:f });
