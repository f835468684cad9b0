import { timedQuery, type DbClient } from '../lib/db.js';
import type { ContentReferenceSource } from '../services/images/types.js';

type CountRow = { count: string };

// position() is a plain substring test, so `%` and `_` in file names need no escaping.
async function countContaining(client: DbClient, table: 'pages' | 'page_revisions', term: string): Promise<number> {
  const res = await timedQuery<CountRow>(
    client,
    `SELECT count(*) AS count FROM ${table} WHERE position($1 in html) > 0`,
    [term]
  );
  return Number(res.rows[0]?.count ?? 0);
}

export function createContentRepository(client: DbClient): ContentReferenceSource {
  return {
    countPagesContaining: (term) => countContaining(client, 'pages', term),
    countRevisionsContaining: (term) => countContaining(client, 'page_revisions', term),
  };
}
