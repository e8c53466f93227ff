// app/insights.ts
import {
  isCompleteRow,
  type InsightChartModel,
  type IssueColumn,
  type IssueRow,
  type JsonValue,
} from '../types';

/* ------------------ colors ------------------ */

// cycled bar by bar, first bar gets the first color
export const BAR_PALETTE: readonly string[] = [
  '#3498db',
  '#2ecc71',
  '#f39c12',
  '#9b59b6',
  '#34495e',
  '#e74c3c',
  '#1abc9c',
  '#f1c40f',
];

export function barColor(index: number): string {
  return BAR_PALETTE[index % BAR_PALETTE.length] ?? '#999999';
}

/* ------------------ insight catalog ------------------ */

type InsightDef = {
  name: string;
  column: Exclude<IssueColumn, 'JIRA Key' | 'Summary' | 'Comments'>;
  categoryAxisTitle: string;
};

const INSIGHTS: readonly InsightDef[] = [
  { name: 'Issue Distribution by Type', column: 'Type', categoryAxisTitle: 'Issue Type' },
  { name: 'Issue Status Distribution', column: 'Status', categoryAxisTitle: 'Issue Status' },
  { name: 'Fix Version Status', column: 'Fix Version', categoryAxisTitle: 'Fix Version' },
  { name: 'Project-wise Issue Count', column: 'Project', categoryAxisTitle: 'Project' },
  { name: 'Issue Distribution by CAT Scope', column: 'CAT Scope', categoryAxisTitle: 'CAT Scope' },
  {
    name: 'Issue Distribution by IT Portal/SR/CR',
    column: 'IT Portal/SR/CR',
    categoryAxisTitle: 'IT Portal/SR/CR',
  },
];

export const INSIGHT_NAMES: readonly string[] = INSIGHTS.map((d) => d.name);

export const DEFAULT_INSIGHTS: readonly string[] = ['Issue Distribution by Type'];

/* ------------------ aggregation ------------------ */

/** Display text for a cell; custom fields may hold objects or numbers. */
export function cellText(v: JsonValue): string {
  return typeof v === 'string' ? v : JSON.stringify(v);
}

export function cellOf(row: IssueRow, column: IssueColumn): JsonValue | undefined {
  if (isCompleteRow(row)) return row[column];
  if (column === 'JIRA Key' || column === 'Comments') return row[column];
  return undefined;
}

/**
 * Value counts for one column. Rows without the column (degraded rows) are
 * skipped; ordered by count descending, ties in first-seen order.
 */
export function countValues(
  rows: IssueRow[],
  column: IssueColumn
): { label: string; count: number }[] {
  // keyed by JSON text so the string "7" and the number 7 stay apart
  const counts = new Map<string, { label: string; count: number }>();
  for (const r of rows) {
    const v = cellOf(r, column);
    if (v === undefined) continue;
    const key = JSON.stringify(v);
    const hit = counts.get(key);
    if (hit) hit.count++;
    else counts.set(key, { label: cellText(v), count: 1 });
  }
  // Array.prototype.sort is stable, so Map insertion order settles ties
  return Array.from(counts.values()).sort((a, b) => b.count - a.count);
}

/** Chart for a named insight, or null when the name is not one we know. */
export function buildInsightChart(
  insight: string,
  rows: IssueRow[]
): InsightChartModel | null {
  const def = INSIGHTS.find((d) => d.name === insight);
  if (!def) return null;

  return {
    insight: def.name,
    title: def.name,
    categoryAxisTitle: def.categoryAxisTitle,
    valueAxisTitle: 'Count',
    bars: countValues(rows, def.column).map((c, i) => ({
      ...c,
      color: barColor(i),
    })),
  };
}
