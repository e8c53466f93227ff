// types/index.ts
// Central shared types for the release dashboard.

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Project catalog: Jira project key -> display name. */
export type ProjectCatalog = Record<string, string>;

/**
 * Raw issue as returned by /rest/api/3/search.
 * Only `key` and `fields` are read; everything else passes through untouched.
 */
export type RawIssue = JsonObject;

/** Columns of a normalized issue row, in display order. */
export const ISSUE_COLUMNS = [
  'JIRA Key',
  'Summary',
  'Type',
  'Status',
  'Fix Version',
  'Project',
  'CAT Scope',
  'IT Portal/SR/CR',
  'Comments',
] as const;

export type IssueColumn = (typeof ISSUE_COLUMNS)[number];

export const NOT_UPDATED = 'Not updated';
export const UNKNOWN_KEY = 'Unknown';

export type CompleteIssueRow = {
  'JIRA Key': string;
  Summary: string;
  Type: string;
  Status: string;
  'Fix Version': string;
  Project: string;
  'CAT Scope': string;
  // the custom field is passed through as-is, so it may be any JSON value
  'IT Portal/SR/CR': JsonValue;
  Comments: string;
};

/** What normalization returns when extraction blew up part way. */
export type DegradedIssueRow = {
  'JIRA Key': typeof UNKNOWN_KEY;
  Comments: string;
};

export type IssueRow = CompleteIssueRow | DegradedIssueRow;

/** Degraded rows carry only JIRA Key and Comments. */
export function isCompleteRow(row: IssueRow): row is CompleteIssueRow {
  return 'Type' in row;
}

export type Selection = {
  projects: string[];
  versions: string[];
  insights: string[];
};

export type KpiCounts = {
  total: number;
  stories: number;
  defects: number;
  epics: number;
  /** false when every row is degraded, i.e. no row carries a Type column */
  typeColumnPresent: boolean;
};

export type InsightBar = { label: string; count: number; color: string };

export type InsightChartModel = {
  insight: string;
  title: string;
  categoryAxisTitle: string;
  valueAxisTitle: string;
  bars: InsightBar[];
};

export type Notice = { level: 'error' | 'warning'; message: string };

export type VersionGroup =
  | { status: 'empty'; version: string; warning: string }
  | {
      status: 'ready';
      version: string;
      projectNames: string[];
      rows: IssueRow[];
      kpis: KpiCounts;
      /** selected insight charts, two per row */
      insightRows: InsightChartModel[][];
    };

export type DashboardView = {
  projectOptions: { key: string; name: string }[];
  versionOptions: string[];
  insightOptions: string[];
  selection: Selection;
  notice: Notice | null;
  groups: VersionGroup[];
};
