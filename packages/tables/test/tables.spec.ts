/* packages/tables/test/tables.spec.ts */
import { describe, it, expect } from 'vitest';
import { SchemaError } from '@wikireplica/core';
import { getTable, hasTable, schemaOverridesFor, tableNames } from '../src';

describe('table descriptors', () => {
  it('lists every replica table', () => {
    const names = tableNames();
    expect(names).toHaveLength(72);
    expect(names).toContain('page');
    expect(names).toContain('wbt_text_in_lang');
  });

  it('describes columns in declaration order', () => {
    expect(getTable('page_assessments')).toEqual({
      name: 'page_assessments',
      primaryKey: ['pa_page_id', 'pa_project_id'],
      columns: [
        { name: 'pa_page_id', type: 'int64' },
        { name: 'pa_project_id', type: 'int64' },
        { name: 'pa_class', type: 'string' },
        { name: 'pa_importance', type: 'string' },
        { name: 'pa_page_revision', type: 'int64' }
      ]
    });
  });

  it('rejects unknown tables', () => {
    expect(hasTable('pages')).toBe(false);
    expect(() => getTable('pages')).toThrow(new SchemaError('Unknown table: pages'));
  });

  it('merges column types into overrides', () => {
    expect(schemaOverridesFor('page_props', 'linktarget')).toEqual({
      pp_page: 'int64',
      pp_propname: 'string',
      pp_value: 'string',
      pp_sortkey: 'float64',
      lt_id: 'int64',
      lt_namespace: 'int64',
      lt_title: 'string'
    });
  });
});
