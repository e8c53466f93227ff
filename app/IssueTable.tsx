// app/IssueTable.tsx
import type { CSSProperties } from 'react';
import { ISSUE_COLUMNS, type IssueRow } from '../types';
import { cellOf, cellText } from './insights';

const th: CSSProperties = {
  position: 'sticky',
  top: 0,
  background: '#f9fafb',
  padding: '6px 8px',
  fontSize: 12,
  fontWeight: 600,
  color: '#374151',
  textAlign: 'left',
  borderBottom: '1px solid #e5e7eb',
  whiteSpace: 'nowrap',
};

const td = (muted?: boolean): CSSProperties => ({
  padding: '4px 8px',
  fontSize: 12,
  color: muted ? '#9ca3af' : '#111827',
  borderBottom: '1px solid #f3f4f6',
  verticalAlign: 'top',
});

/** Rows numbered from 1; degraded rows leave their missing cells blank. */
export function IssueTable({ rows }: { rows: IssueRow[] }) {
  return (
    <div
      style={{
        maxHeight: 420,
        overflow: 'auto',
        border: '1px solid #eee',
        borderRadius: 12,
      }}
    >
      <table style={{ borderCollapse: 'collapse', width: '100%' }}>
        <thead>
          <tr>
            <th style={th}>#</th>
            {ISSUE_COLUMNS.map((c) => (
              <th key={c} style={th}>
                {c}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.map((r, i) => (
            <tr key={i}>
              <td style={td(true)}>{i + 1}</td>
              {ISSUE_COLUMNS.map((c) => {
                const v = cellOf(r, c);
                return (
                  <td key={c} style={td(v === undefined)}>
                    {v === undefined ? '' : cellText(v)}
                  </td>
                );
              })}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
