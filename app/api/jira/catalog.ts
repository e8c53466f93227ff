// app/api/jira/catalog.ts
import type { ProjectCatalog } from '../../../types';
import { isJsonObject, type JiraClient } from './jiraClient';

export async function listProjects(client: JiraClient): Promise<ProjectCatalog> {
  const data = await client.get('/rest/api/3/project');
  const out: ProjectCatalog = {};
  if (!Array.isArray(data)) return out;

  for (const p of data) {
    if (!isJsonObject(p)) continue;
    const key = p.key;
    if (typeof key !== 'string' || !key) continue;
    out[key] = typeof p.name === 'string' ? p.name : key;
  }
  return out;
}

/** Version names of one project, in the order Jira lists them. */
export async function listVersions(
  client: JiraClient,
  projectKey: string
): Promise<string[]> {
  const data = await client.get(
    `/rest/api/3/project/${encodeURIComponent(projectKey)}/versions`
  );
  if (!Array.isArray(data)) return [];

  const out: string[] = [];
  for (const v of data) {
    if (isJsonObject(v) && typeof v.name === 'string') out.push(v.name);
  }
  return out;
}

/**
 * Options for the fix-version picker: every version of every selected
 * project, first occurrence wins.
 */
export async function listVersionOptions(
  client: JiraClient,
  projectKeys: string[]
): Promise<string[]> {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const key of projectKeys) {
    for (const name of await listVersions(client, key)) {
      if (seen.has(name)) continue;
      seen.add(name);
      out.push(name);
    }
  }
  return out;
}
