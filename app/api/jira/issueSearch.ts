// app/api/jira/issueSearch.ts
import type { RawIssue } from '../../../types';
import { isJsonObject, type JiraClient } from './jiraClient';

export function buildIssueJql(projectKey: string, versionName: string) {
  return `project = ${projectKey} AND fixVersion = "${versionName}"`;
}

/**
 * One page of issues for a project/fix-version pair (Jira's default page size;
 * no paging).
 */
export async function searchIssues(
  client: JiraClient,
  projectKey: string,
  versionName: string
): Promise<RawIssue[]> {
  const data = await client.get('/rest/api/3/search', {
    jql: buildIssueJql(projectKey, versionName),
    expand: 'changelog,issuelinks',
  });
  if (!isJsonObject(data)) return [];

  const issues = data.issues;
  if (!Array.isArray(issues)) return [];
  return issues.filter(isJsonObject);
}
