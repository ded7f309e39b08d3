// packages/query/src/statements.ts
import { mediawiki } from '@wikireplica/tables';
import { buildPredicates, column, predicateToSql } from './predicates';

export type OneOrMany = string | Iterable<string>;

export const PAGES_BY_WIKIPROJECT_COLUMNS = {
  name: column('page_assessments_projects', 'pap_project_title'),
  quality: column('page_assessments', 'pa_class'),
  priority: column('page_assessments', 'pa_importance')
} as const;

/**
 * Pages with their assessments, by WikiProject (or task force).
 *
 * Use the wiki's local project titles and grade names, e.g. on zhwiki
 * '电子游戏' for WikiProject Video games and '乙' for B-Class.
 * Leaving `name` out selects every project's assessments, not only the
 * project-independent one.
 *
 * Selected: page_id, page_namespace, page_title, pap_project_title,
 * pa_class (nullable), pa_importance (nullable).
 */
export function queryPagesByWikiProject(
  name?: OneOrMany | null,
  opts: { quality?: OneOrMany | null; priority?: OneOrMany | null } = {}
) {
  const predicates = buildPredicates([
    [PAGES_BY_WIKIPROJECT_COLUMNS.name, name],
    [PAGES_BY_WIKIPROJECT_COLUMNS.quality, opts.quality],
    [PAGES_BY_WIKIPROJECT_COLUMNS.priority, opts.priority]
  ]);

  let q = mediawiki
    .selectFrom('page_assessments_projects')
    .innerJoin('page_assessments', 'page_assessments_projects.pap_project_id', 'page_assessments.pa_project_id')
    .innerJoin('page', 'page_assessments.pa_page_id', 'page.page_id')
    .select([
      'page.page_id',
      'page.page_namespace',
      'page.page_title',
      'page_assessments_projects.pap_project_title',
      'page_assessments.pa_class',
      'page_assessments.pa_importance'
    ]);

  for (const p of predicates) q = q.where(predicateToSql(p));
  return q;
}
