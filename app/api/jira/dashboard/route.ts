// app/api/jira/dashboard/route.ts
import { NextRequest, NextResponse } from 'next/server';
import { buildDashboard, parseSelection } from '../../../dashboardModel';
import { normalizeIssue } from '../../../normalizeIssue';
import { listProjects, listVersionOptions } from '../catalog';
import { searchIssues } from '../issueSearch';
import { createJiraClient, HttpError, loadJiraConfig } from '../jiraClient';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

// read once per server process
const config = loadJiraConfig();

export async function POST(req: NextRequest) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return NextResponse.json({ error: 'Invalid JSON body' }, { status: 400 });
  }

  const client = createJiraClient(config);

  try {
    const view = await buildDashboard(parseSelection(body), {
      listProjects: () => listProjects(client),
      listVersionOptions: (keys) => listVersionOptions(client, keys),
      search: (projectKey, version) => searchIssues(client, projectKey, version),
      normalize: (raw) => normalizeIssue(raw, config.fieldIds),
    });
    return NextResponse.json(view);
  } catch (e) {
    if (e instanceof HttpError) {
      console.error(`Jira request failed (HTTP ${e.status}): ${e.message}`);
      return NextResponse.json(
        {
          upstreamStatus: e.status,
          upstream: { errorMessages: e.errorMessages },
        },
        { status: 502 }
      );
    }
    const message = e instanceof Error ? e.message : 'Unexpected error';
    console.error('Dashboard build failed:', e);
    return NextResponse.json({ error: message }, { status: 500 });
  }
}
