// app/buildIssueTable.ts
import type { IssueRow, RawIssue } from '../types';
import { normalizeIssue } from './normalizeIssue';

export type IssueSearchFn = (
  projectKey: string,
  versionName: string
) => Promise<RawIssue[]>;

/**
 * Rows for every (project, version) pair, projects outer, versions inner,
 * each search's issues in Jira order. Searches run one after another.
 */
export async function buildIssueTable(
  projectKeys: string[],
  versionNames: string[],
  search: IssueSearchFn,
  normalize: (raw: RawIssue) => IssueRow = normalizeIssue
): Promise<IssueRow[]> {
  const rows: IssueRow[] = [];
  for (const projectKey of projectKeys) {
    for (const versionName of versionNames) {
      const issues = await search(projectKey, versionName);
      for (const raw of issues) rows.push(normalize(raw));
    }
  }
  return rows;
}
