#!/usr/bin/env node
/**
 * ETL workflow index: stdio JSON-RPC entry point.
 *
 * Loads workflow sets from WORKFLOW_CATALOG_DIR (unless disabled with
 * WORKFLOW_CATALOG_LOAD_ON_START=0), builds the semantic index, then serves
 * line-delimited JSON-RPC on stdin/stdout until stdin closes.
 */
import { getRuntimeConfig } from '../config/runtimeConfig';
import { getCatalog } from '../services/catalogContext';
import '../services/handlers.workflows';
import { logError, logInfo } from '../services/logger';
import { listRegisteredMethods } from './registry';
import { startTransport } from './transport';

export async function main(): Promise<void> {
  const cfg = getRuntimeConfig();
  logInfo('server_starting', { profile: cfg.profile, catalogDir: cfg.catalog.baseDir, methods: listRegisteredMethods() });
  if(cfg.catalog.loadOnStart){
    const report = await getCatalog().ingestDirectory(cfg.catalog.baseDir);
    logInfo('server_catalog_ready', { version: report.version, indexStatus: report.indexStatus, errors: report.errors.length });
  }
  await startTransport();
  logInfo('server_stdin_closed');
}

if(require.main === module){
  process.on('unhandledRejection', (reason: unknown) => {
    logError('unhandledRejection', { reason: reason instanceof Error ? reason.message : String(reason) });
  });
  main().then(
    () => process.exit(0),
    (e: unknown) => {
      logError('server_fatal', { message: e instanceof Error ? e.message : String(e) });
      process.exit(1);
    },
  );
}
