// app/dashboardModel.ts
import {
  isCompleteRow,
  type DashboardView,
  type InsightChartModel,
  type IssueRow,
  type KpiCounts,
  type ProjectCatalog,
  type RawIssue,
  type Selection,
  type VersionGroup,
} from '../types';
import { buildIssueTable, type IssueSearchFn } from './buildIssueTable';
import { buildInsightChart, DEFAULT_INSIGHTS, INSIGHT_NAMES } from './insights';

export type DashboardDeps = {
  listProjects: () => Promise<ProjectCatalog>;
  listVersionOptions: (projectKeys: string[]) => Promise<string[]>;
  search: IssueSearchFn;
  normalize?: (raw: RawIssue) => IssueRow;
};

function asStringArray(v: unknown): string[] | null {
  if (!Array.isArray(v)) return null;
  return v.filter((x): x is string => typeof x === 'string');
}

/** Selection from a posted JSON body; non-string entries are dropped. */
export function parseSelection(body: unknown): Selection {
  const b: object = typeof body === 'object' && body !== null ? body : {};
  return {
    projects: ('projects' in b && asStringArray(b.projects)) || [],
    versions: ('versions' in b && asStringArray(b.versions)) || [],
    insights: ('insights' in b && asStringArray(b.insights)) || [
      ...DEFAULT_INSIGHTS,
    ],
  };
}

export function computeKpis(rows: IssueRow[]): KpiCounts {
  const typed = rows.filter(isCompleteRow);
  const ofType = (t: string) => typed.filter((r) => r.Type === t).length;
  return {
    total: rows.length,
    stories: ofType('Story'),
    defects: ofType('Defect'),
    epics: ofType('Epic'),
    typeColumnPresent: typed.length > 0,
  };
}

export function chunkPairs<T>(xs: T[]): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < xs.length; i += 2) out.push(xs.slice(i, i + 2));
  return out;
}

export function noDataWarning(projectNames: string[], version: string) {
  return `No data found for the selected project(s): ${projectNames.join(
    ', '
  )} and fix version '${version}'.`;
}

/**
 * Whole dashboard for one selection. Stateless: the page calls this again on
 * every change and every call goes back to Jira. Upstream HttpErrors are not
 * caught here.
 */
export async function buildDashboard(
  selection: Selection,
  deps: DashboardDeps
): Promise<DashboardView> {
  const view: DashboardView = {
    projectOptions: [],
    versionOptions: [],
    insightOptions: [...INSIGHT_NAMES],
    selection: { projects: [], versions: [], insights: selection.insights },
    notice: null,
    groups: [],
  };

  const catalog = await deps.listProjects();
  view.projectOptions = Object.entries(catalog).map(([key, name]) => ({
    key,
    name,
  }));
  if (!view.projectOptions.length) {
    view.notice = { level: 'error', message: 'Error fetching projects.' };
    return view;
  }

  const projects = selection.projects.filter((k) => Object.hasOwn(catalog, k));
  view.selection.projects = projects;
  if (!projects.length) {
    view.notice = {
      level: 'warning',
      message: 'Please select at least one project.',
    };
    return view;
  }

  view.versionOptions = await deps.listVersionOptions(projects);
  const versions = selection.versions.filter((v) =>
    view.versionOptions.includes(v)
  );
  view.selection.versions = versions;
  if (!versions.length) {
    view.notice = {
      level: 'warning',
      message: 'Please select at least one fix version.',
    };
    return view;
  }

  const projectNames = projects.map((k) => catalog[k] ?? k);

  for (const version of versions) {
    const rows = await buildIssueTable(
      projects,
      [version],
      deps.search,
      deps.normalize
    );
    view.groups.push(versionGroup(version, projectNames, rows, selection.insights));
  }
  return view;
}

function versionGroup(
  version: string,
  projectNames: string[],
  rows: IssueRow[],
  insights: string[]
): VersionGroup {
  if (!rows.length) {
    return {
      status: 'empty',
      version,
      warning: noDataWarning(projectNames, version),
    };
  }

  const charts: InsightChartModel[] = [];
  for (const name of insights) {
    const chart = buildInsightChart(name, rows);
    if (chart) charts.push(chart);
  }

  return {
    status: 'ready',
    version,
    projectNames,
    rows,
    kpis: computeKpis(rows),
    insightRows: chunkPairs(charts),
  };
}
