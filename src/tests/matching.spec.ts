import { describe, it, expect } from 'vitest';
import { isReasonableMatch, stripCommonPrefix, tableRole, workflowHasTable } from '../services/matching';
import { matchesAllFilters, matchesFilter } from '../models/filters';
import { session, sourceTable, targetTable, workflow } from './testUtils';

describe('name matching', () => {
  it('strips the first matching naming prefix', () => {
    expect(stripCommonPrefix('WF_LOAD_CUSTOMERS')).toBe('load_customers');
    expect(stripCommonPrefix('m_orders')).toBe('orders');
    expect(stripCommonPrefix('ORDERS')).toBe('orders');
    expect(stripCommonPrefix('x_orders', ['x_'])).toBe('orders');
  });

  it.each([
    ['load_customers', 'LOAD_CUSTOMERS', true],
    ['customers', 'wf_load_customers', true],
    ['wf_load_customers_daily', 'load_customers', true],
    ['wf_orders', 's_orders', true],
    ['orders', 'customers', false],
    ['workflow_a', 'mapping_b', false],
  ])('isReasonableMatch(%s, %s) -> %s', (query, name, expected) => {
    expect(isReasonableMatch(query, name)).toBe(expected);
  });

  it('honours a custom prefix list', () => {
    expect(isReasonableMatch('etl_orders', 'job_orders')).toBe(false);
    expect(isReasonableMatch('etl_orders', 'job_orders', ['etl_', 'job_'])).toBe(true);
  });
});

describe('table roles', () => {
  const wf = workflow('set1', 'LOAD_A', {
    sourceTables: [sourceTable('STG_A'), sourceTable('A')],
    targetTables: [targetTable('A'), targetTable('B')],
  });

  it('reports the role case-insensitively', () => {
    expect(tableRole(wf, 'stg_a')).toBe('source');
    expect(tableRole(wf, 'b')).toBe('target');
    expect(tableRole(wf, 'A')).toBe('source+target');
    expect(tableRole(wf, 'C')).toBeUndefined();
    expect(workflowHasTable(wf, 'Stg_A')).toBe(true);
    expect(workflowHasTable(wf, 'C')).toBe(false);
  });
});

describe('workflow filters', () => {
  const wf = workflow('set7', 'LOAD_A', {
    status: 'inactive',
    sessions: [session('s1', 'LOAD_A'), session('s2', 'LOAD_A')],
    sourceTables: [sourceTable('STG_A')],
    targetTables: [targetTable('DIM_A')],
  });

  it('evaluates each filter kind', () => {
    expect(matchesFilter(wf, { kind: 'status_equals', status: 'inactive' })).toBe(true);
    expect(matchesFilter(wf, { kind: 'status_equals', status: 'active' })).toBe(false);
    expect(matchesFilter(wf, { kind: 'set_equals', setId: 'set7' })).toBe(true);
    expect(matchesFilter(wf, { kind: 'has_source_table', table: 'stg_a' })).toBe(true);
    expect(matchesFilter(wf, { kind: 'has_source_table', table: 'DIM_A' })).toBe(false);
    expect(matchesFilter(wf, { kind: 'has_target_table', table: 'dim_a' })).toBe(true);
    expect(matchesFilter(wf, { kind: 'session_count', min: 2, max: 2 })).toBe(true);
    expect(matchesFilter(wf, { kind: 'session_count', min: 3 })).toBe(false);
    expect(matchesFilter(wf, { kind: 'session_count', max: 1 })).toBe(false);
    expect(matchesFilter(wf, { kind: 'session_count' })).toBe(true);
  });

  it('requires every filter and accepts an empty list', () => {
    expect(matchesAllFilters(wf, [])).toBe(true);
    expect(matchesAllFilters(wf, [{ kind: 'set_equals', setId: 'set7' }, { kind: 'status_equals', status: 'active' }])).toBe(false);
  });
});
