// app/KpiRow.tsx
import type { ReactNode } from 'react';
import type { KpiCounts } from '../types';

/* ------------------ shared UI helpers ------------------ */

function Card({ title, children }: { title: string; children: ReactNode }) {
  return (
    <div
      style={{
        border: '1px solid #eee',
        borderRadius: 12,
        padding: 12,
        boxShadow: '0 1px 4px rgba(0, 0, 0, 0.04)',
        display: 'flex',
        flexDirection: 'column',
      }}
    >
      <div style={{ fontSize: 13, color: '#6b7280', marginBottom: 6 }}>
        {title}
      </div>
      <div style={{ color: '#111827' }}>{children}</div>
    </div>
  );
}

function Metric({ value }: { value: number }) {
  return <span style={{ fontSize: 28, fontWeight: 700 }}>{value}</span>;
}

function NoData() {
  return (
    <span
      style={{
        display: 'inline-block',
        padding: '2px 8px',
        borderRadius: 6,
        background: '#FEF3C7',
        color: '#92400E',
        fontSize: 13,
      }}
    >
      No data available
    </span>
  );
}

/* ------------------ KPI Row ------------------ */

export function KpiRow({ kpis }: { kpis: KpiCounts }) {
  const typed = (v: number) =>
    kpis.typeColumnPresent ? <Metric value={v} /> : <NoData />;

  return (
    <div
      style={{
        display: 'grid',
        gridTemplateColumns: 'repeat(4, minmax(0, 1fr))',
        gap: 12,
      }}
    >
      <Card title="Total issue count">
        <Metric value={kpis.total} />
      </Card>
      <Card title="Total Stories">{typed(kpis.stories)}</Card>
      <Card title="Total Defects">{typed(kpis.defects)}</Card>
      <Card title="Total Epics">{typed(kpis.epics)}</Card>
    </div>
  );
}
