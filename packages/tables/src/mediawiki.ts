// packages/tables/src/mediawiki.ts
// Kysely typing for the tables the statement builders touch. Text columns are
// varbinary on the replicas; they are typed as string because structured
// statements are materialized in 'string' mode.
import {
  DummyDriver,
  Kysely,
  MysqlAdapter,
  MysqlIntrospector,
  MysqlQueryCompiler
} from 'kysely';

export interface PageTable {
  page_id: number;
  page_namespace: number;
  page_title: string;
  page_is_redirect: number;
  page_is_new: number;
  page_random: number;
  page_touched: string;
  page_links_updated: string | null;
  page_latest: number;
  page_len: number;
  page_content_model: string | null;
  page_lang: string | null;
}

export interface PageAssessmentsTable {
  pa_page_id: number;
  pa_project_id: number;
  pa_class: string | null;
  pa_importance: string | null;
  pa_page_revision: number;
}

export interface PageAssessmentsProjectsTable {
  pap_project_id: number;
  pap_project_title: string;
  pap_parent_id: number | null;
}

export interface PagePropsTable {
  pp_page: number;
  pp_propname: string;
  pp_value: string;
  pp_sortkey: number | null;
}

export interface CategorylinksTable {
  cl_from: number;
  cl_to: string;
  cl_sortkey: string;
  cl_sortkey_prefix: string;
  cl_timestamp: Date;
  cl_collation: string;
  cl_type: string;
}

export interface LinktargetTable {
  lt_id: number;
  lt_namespace: number;
  lt_title: string;
}

export interface TemplatelinksTable {
  tl_from: number;
  tl_target_id: number;
  tl_from_namespace: number;
}

export interface RedirectTable {
  rd_from: number;
  rd_namespace: number;
  rd_title: string;
  rd_interwiki: string | null;
  rd_fragment: string | null;
}

export interface MediaWikiDatabase {
  page: PageTable;
  page_assessments: PageAssessmentsTable;
  page_assessments_projects: PageAssessmentsProjectsTable;
  page_props: PagePropsTable;
  categorylinks: CategorylinksTable;
  linktarget: LinktargetTable;
  templatelinks: TemplatelinksTable;
  redirect: RedirectTable;
}

// Compiles MySQL only; execution goes through the replica registry, which
// needs the driver's column metadata that a Kysely driver would discard.
export const mediawiki = new Kysely<MediaWikiDatabase>({
  dialect: {
    createAdapter: () => new MysqlAdapter(),
    createDriver: () => new DummyDriver(),
    createIntrospector: (db) => new MysqlIntrospector(db),
    createQueryCompiler: () => new MysqlQueryCompiler()
  }
});
