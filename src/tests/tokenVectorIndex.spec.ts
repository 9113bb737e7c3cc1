import { describe, it, expect } from 'vitest';
import { TokenVectorIndex, tokenize, workflowDocument } from '../services/tokenVectorIndex';
import { rawScore } from '../services/semanticIndex';
import { session, sourceTable, targetTable, transformation, workflow } from './testUtils';

const loadCustomers = workflow('set30', 'LOAD_CUSTOMERS', {
  description: 'Daily customer load',
  sessions: [session('s_load_customers', 'LOAD_CUSTOMERS')],
  sourceTables: [sourceTable('STG_CUSTOMERS')],
  targetTables: [targetTable('CUSTOMERS')],
  transformations: [transformation('EXP_CLEAN', 'expression')],
});
const loadOrders = workflow('set1', 'LOAD_ORDERS', { targetTables: [targetTable('ORDERS')] });

describe('tokenize', () => {
  it('keeps whole identifiers and their underscore parts', () => {
    expect(tokenize('Target table LOAD_CUSTOMERS.dbo')).toEqual(['target', 'table', 'load_customers', 'load', 'customers', 'dbo']);
    expect(tokenize('  ')).toEqual([]);
  });
});

describe('workflowDocument', () => {
  it('lists the workflow and its components', () => {
    expect(workflowDocument(loadCustomers)).toBe([
      'Workflow: LOAD_CUSTOMERS',
      'Description: Daily customer load',
      'Status: active',
      'Set: set30',
      'Session s_load_customers mapping m_load_customers',
      'Source table STG_CUSTOMERS stage',
      'Target table CUSTOMERS dw',
      'Transformation EXP_CLEAN expression',
    ].join('\n'));
  });
});

describe('TokenVectorIndex', () => {
  it('starts empty and becomes ready after indexing', async () => {
    const index = new TokenVectorIndex();
    expect(index.status()).toBe('empty');
    await index.index([loadCustomers, loadOrders]);
    expect(index.status()).toBe('ready');
    // one workflow document per record plus one per component
    expect(index.size()).toBe(2 + 3 + 1);
  });

  it('returns workflow candidates ordered by distance', async () => {
    const index = new TokenVectorIndex();
    await index.index([loadCustomers, loadOrders]);
    const hits = await index.query('load customers', 10, { scope: 'workflows' });
    expect(hits.map(h => h.ref.workflowName)).toEqual(['LOAD_CUSTOMERS', 'LOAD_ORDERS']);
    expect(hits.every(h => h.provenance === 'workflow')).toBe(true);
    expect(hits[0].distance).toBeLessThan(hits[1].distance);
  });

  it('restricts component queries to the requested kinds', async () => {
    const index = new TokenVectorIndex();
    await index.index([loadCustomers, loadOrders]);
    const hits = await index.query('target table CUSTOMERS', 10, { scope: 'components', kinds: ['target_table'] });
    expect(hits.map(h => `${h.ref.workflowName}/${h.componentName}`)).toEqual(['LOAD_CUSTOMERS/CUSTOMERS']);
  });

  it('matches tables on their name rather than role words', async () => {
    const index = new TokenVectorIndex();
    await index.index([loadCustomers, loadOrders]);
    expect(await index.query('target table', 10, { scope: 'components' })).toEqual([]);
  });

  it('ranks a wide table named in the query above tables owned by similarly named workflows', async () => {
    const columns = Array.from({ length: 40 }, (_, i) => ({ name: `C${i}` }));
    const nightly = workflow('set1', 'WF_NIGHTLY', { targetTables: [targetTable('ACCT', { columns })] });
    const noise = Array.from({ length: 25 }, (_, i) => workflow('set2', `LOAD_ACCT_${i}`, { targetTables: [targetTable(`T${i}`)] }));
    const index = new TokenVectorIndex();
    await index.index([...noise, nightly]);
    const hits = await index.query('target table ACCT', 20, { scope: 'components', kinds: ['target_table'] });
    expect(hits).toHaveLength(20);
    expect(`${hits[0].ref.workflowName}/${hits[0].componentName}`).toBe('WF_NIGHTLY/ACCT');
  });

  it('honours topK and ignores documents sharing no term', async () => {
    const index = new TokenVectorIndex();
    await index.index([loadCustomers, loadOrders]);
    expect(await index.query('load', 1, { scope: 'workflows' })).toHaveLength(1);
    expect(await index.query('zzz', 10)).toEqual([]);
  });

  it('replaces previous documents on reindex', async () => {
    const index = new TokenVectorIndex();
    await index.index([loadCustomers, loadOrders]);
    await index.index([loadOrders]);
    const hits = await index.query('customers', 10);
    expect(hits).toEqual([]);
    expect(index.size()).toBe(2);
  });
});

describe('rawScore', () => {
  it('clamps distances into a [0, 1] score', () => {
    expect(rawScore(0.25)).toBe(0.75);
    expect(rawScore(-1)).toBe(1);
    expect(rawScore(3)).toBe(0);
    expect(rawScore(Number.NaN)).toBe(0);
  });
});
