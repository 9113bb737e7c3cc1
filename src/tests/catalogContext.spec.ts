import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { WorkflowCatalog } from '../services/catalogContext';
import { SemanticIndex } from '../services/semanticIndex';
import { TokenVectorIndex } from '../services/tokenVectorIndex';
import { FailingIndex, TEST_SEARCH, setsOf, sourceTable, targetTable, workflow } from './testUtils';

const loadCustomers = workflow('set30', 'LOAD_CUSTOMERS', { targetTables: [targetTable('CUSTOMERS', { loadType: undefined })] });
const loadOrders = workflow('set1', 'LOAD_ORDERS', { sourceTables: [sourceTable('CUSTOMERS')], targetTables: [targetTable('ORDERS')] });

const newCatalog = (indexFactory?: () => SemanticIndex, historySize = 100) =>
  new WorkflowCatalog({ indexFactory, search: { ...TEST_SEARCH, historySize }, diagnostics: { maxRecommendations: 10 } });

/** Index whose build waits until released, to observe readers during a refresh. */
class GatedIndex extends TokenVectorIndex {
  release: () => void = () => undefined;
  private readonly gate = new Promise<void>(resolve => { this.release = resolve; });
  async index(records: Parameters<TokenVectorIndex['index']>[0]): Promise<void> {
    await this.gate;
    return super.index(records);
  }
}

describe('WorkflowCatalog', () => {
  let tmp: string | undefined;
  afterEach(() => { if(tmp) fs.rmSync(tmp, { recursive: true, force: true }); tmp = undefined; });

  it('serves searches after a refresh and reports statistics', async () => {
    const catalog = newCatalog();
    const report = await catalog.refresh(setsOf(loadCustomers, loadOrders));
    expect(report.indexStatus).toBe('ready');
    expect(report.version).toBe(1);
    const exact = await catalog.searchByName('load_customers');
    expect(exact.results.map(r => r.confidence)).toEqual([1]);
    const table = await catalog.searchTableWorkflows('CUSTOMERS');
    expect(table.results.map(r => r.workflow.name).sort()).toEqual(['LOAD_CUSTOMERS', 'LOAD_ORDERS']);
    const stats = catalog.getStatistics();
    expect(stats).toMatchObject({ recordCount: 2, setCount: 2, sets: ['set30', 'set1'], version: 1, indexStatus: 'ready', searchCount: 2, indexFailures: 0 });
    expect(typeof stats.lastRefreshedAt).toBe('string');
  });

  it('exposes records, dependents and diagnostics over the same snapshot', async () => {
    const catalog = newCatalog();
    await catalog.refresh(setsOf(loadCustomers, loadOrders));
    expect(catalog.getWorkflow('set1', 'LOAD_ORDERS')?.name).toBe('LOAD_ORDERS');
    expect(catalog.getWorkflow('set1', 'LOAD_CUSTOMERS')).toBeUndefined();
    expect(catalog.findDependents('LOAD_CUSTOMERS').map(w => w.name)).toEqual(['LOAD_ORDERS']);
    const report = await catalog.analyzeTable('ORDERS');
    expect(report.responsibleWorkflows.map(r => r.workflow.name)).toEqual(['LOAD_ORDERS']);
    expect(report.issues).toEqual([]);
    const diag = await catalog.diagnoseWorkflow('LOAD_CUSTOMERS');
    expect(diag.issues).toEqual(['Target table CUSTOMERS has no load type specified']);
  });

  it('still swaps the repository when the index build fails', async () => {
    const catalog = newCatalog(() => new FailingIndex('index'));
    const report = await catalog.refresh(setsOf(loadCustomers));
    expect(report.indexStatus).toBe('failed');
    expect((await catalog.searchByName('LOAD_CUSTOMERS')).status).toBe('ok');
    const fuzzy = await catalog.searchByName('customers', false);
    expect(fuzzy.status).toBe('index_unavailable');
    const stats = catalog.getStatistics();
    expect(stats.indexStatus).toBe('failed');
    expect(stats.indexFailures).toBe(2);
  });

  it('keeps readers on the old state until the new index is ready', async () => {
    let gated: GatedIndex | undefined;
    let builds = 0;
    const catalog = newCatalog(() => {
      builds++;
      if(builds === 1) return new TokenVectorIndex();
      gated = new GatedIndex();
      return gated;
    });
    await catalog.refresh(setsOf(loadCustomers));
    const pending = catalog.refresh(setsOf(loadOrders));
    await new Promise(r => setTimeout(r, 0));
    expect(catalog.getWorkflow('set30', 'LOAD_CUSTOMERS')).toBeDefined();
    expect(catalog.getWorkflow('set1', 'LOAD_ORDERS')).toBeUndefined();
    gated?.release();
    await pending;
    expect(catalog.getWorkflow('set30', 'LOAD_CUSTOMERS')).toBeUndefined();
    expect(catalog.getWorkflow('set1', 'LOAD_ORDERS')).toBeDefined();
  });

  it('applies concurrent refreshes in call order', async () => {
    const catalog = newCatalog();
    const first = catalog.refresh(setsOf(loadCustomers));
    const second = catalog.refreshSet('set1', [loadOrders]);
    const [a, b] = await Promise.all([first, second]);
    expect([a.version, b.version]).toEqual([1, 2]);
    expect(catalog.getStatistics().sets).toEqual(['set30', 'set1']);
  });

  it('yields identical results after refreshing twice with the same records', async () => {
    const catalog = newCatalog();
    await catalog.refresh(setsOf(loadCustomers, loadOrders));
    const before = await catalog.searchTableWorkflows('CUSTOMERS');
    await catalog.refresh(setsOf(loadCustomers, loadOrders));
    expect(await catalog.searchTableWorkflows('CUSTOMERS')).toEqual(before);
  });

  it('bounds the search history', async () => {
    const catalog = newCatalog(undefined, 2);
    await catalog.refresh(setsOf(loadCustomers));
    await catalog.searchByName('A');
    await catalog.searchByName('LOAD_CUSTOMERS');
    await catalog.searchComponents('');
    const history = catalog.getSearchHistory();
    expect(history.map(h => [h.operation, h.query, h.status, h.resultCount])).toEqual([
      ['searchComponents', '', 'malformed_query', 0],
      ['searchByName', 'LOAD_CUSTOMERS', 'ok', 1],
    ]);
    expect(catalog.getStatistics().searchCount).toBe(3);
  });

  it('finds a wide table among more target tables than the search returns', async () => {
    const columns = Array.from({ length: 40 }, (_, i) => ({ name: `C${i}` }));
    const nightly = workflow('set1', 'WF_NIGHTLY', { targetTables: [targetTable('ACCT', { columns })] });
    const others = Array.from({ length: 25 }, (_, i) => workflow('set2', `LOAD_ACCT_${i}`, { targetTables: [targetTable(`T${i}`)] }));
    const catalog = newCatalog();
    await catalog.refresh(setsOf(nightly, ...others));
    const found = await catalog.searchTableWorkflows('ACCT');
    expect(found.status).toBe('ok');
    expect(found.results.map(r => r.workflow.name)).toEqual(['WF_NIGHTLY']);
    const report = await catalog.analyzeTable('ACCT');
    expect(report.responsibleWorkflows.map(r => r.workflow.name)).toEqual(['WF_NIGHTLY']);
  });

  it('ingests a directory and clears', async () => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'wf-ingest-'));
    fs.writeFileSync(path.join(tmp, 'set30.json'), JSON.stringify({ workflows: [{ name: 'LOAD_CUSTOMERS', status: 'active' }] }), 'utf8');
    fs.writeFileSync(path.join(tmp, 'broken.json'), '[', 'utf8');
    const catalog = newCatalog();
    const report = await catalog.ingestDirectory(tmp);
    expect(report.errors.map(e => e.file)).toEqual(['broken.json']);
    expect(catalog.getStatistics().recordCount).toBe(1);
    await catalog.clear();
    expect(catalog.getStatistics()).toMatchObject({ recordCount: 0, setCount: 0, version: 2 });
  });
});
