/* packages/query/test/statements.spec.ts */
import { describe, it, expect } from 'vitest';
import { queryPagesByWikiProject } from '../src';

describe('queryPagesByWikiProject', () => {
  it('joins projects, assessments and pages without filters', () => {
    const { sql, parameters } = queryPagesByWikiProject().compile();
    expect(sql).toContain('from `page_assessments_projects`');
    expect(sql).toContain(
      'inner join `page_assessments` on `page_assessments_projects`.`pap_project_id` = `page_assessments`.`pa_project_id`'
    );
    expect(sql).toContain('inner join `page` on `page_assessments`.`pa_page_id` = `page`.`page_id`');
    expect(sql).not.toContain('where');
    expect(parameters).toEqual([]);
  });

  it('selects the six documented fields in order', () => {
    const { sql } = queryPagesByWikiProject().compile();
    expect(sql.startsWith(
      'select `page`.`page_id`, `page`.`page_namespace`, `page`.`page_title`, ' +
      '`page_assessments_projects`.`pap_project_title`, `page_assessments`.`pa_class`, ' +
      '`page_assessments`.`pa_importance` from'
    )).toBe(true);
  });

  it('adds one filter per given dimension, in name/quality/priority order', () => {
    const { sql, parameters } = queryPagesByWikiProject('Video games', {
      quality: ['B', 'GA', 'B'],
      priority: 'Top'
    }).compile();
    expect(sql).toContain('`page_assessments_projects`.`pap_project_title` = ?');
    expect(sql).toContain('`page_assessments`.`pa_class` in (?, ?)');
    expect(sql).toContain('`page_assessments`.`pa_importance` = ?');
    expect(parameters).toEqual(['Video games', 'B', 'GA', 'Top']);
  });

  it('treats a null filter as no restriction', () => {
    const { parameters, sql } = queryPagesByWikiProject(null, { quality: null, priority: ['Mid'] }).compile();
    expect(parameters).toEqual(['Mid']);
    expect(sql).not.toContain('pap_project_title` =');
  });
});
