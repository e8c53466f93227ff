// app/page.tsx
'use client';

import { useEffect, useRef, useState } from 'react';
import type { CSSProperties, ReactNode } from 'react';
import type { DashboardView, Notice, Selection, VersionGroup } from '../types';
import { DEFAULT_INSIGHTS } from './insights';
import { InsightChart } from './InsightChart';
import { IssueTable } from './IssueTable';
import { KpiRow } from './KpiRow';

/* ------------------ API types ------------------ */

type DashboardResponse = Partial<DashboardView> & {
  upstreamStatus?: number;
  upstream?: { errorMessages?: string[]; [k: string]: unknown };
  error?: string;
};

async function fetchDashboard(selection: Selection): Promise<DashboardView> {
  const res = await fetch('/api/jira/dashboard', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(selection),
  });
  const data: DashboardResponse = await res.json();

  if (!res.ok) {
    const upstream = data?.upstream?.errorMessages;
    const msg =
      (Array.isArray(upstream) && upstream.join(', ')) ||
      (typeof data?.error === 'string' ? data.error : undefined) ||
      `Dashboard failed (HTTP ${data?.upstreamStatus ?? res.status})`;
    throw new Error(msg);
  }

  return {
    projectOptions: data.projectOptions ?? [],
    versionOptions: data.versionOptions ?? [],
    insightOptions: data.insightOptions ?? [],
    selection: data.selection ?? selection,
    notice: data.notice ?? null,
    groups: data.groups ?? [],
  };
}

const sameList = (a: string[], b: string[]) =>
  a.length === b.length && a.every((x, i) => x === b[i]);

function sameSelection(a: Selection, b: Selection): boolean {
  return (
    sameList(a.projects, b.projects) &&
    sameList(a.versions, b.versions) &&
    sameList(a.insights, b.insights)
  );
}

/* ------------------ style helpers ------------------ */

const section: CSSProperties = {
  padding: 12,
  border: '1px solid #eee',
  borderRadius: 12,
  boxShadow: '0 1px 4px rgba(0,0,0,0.04)',
};

const multi: CSSProperties = {
  padding: '4px 8px',
  borderRadius: 6,
  border: '1px solid #d1d5db',
  fontSize: 13,
  backgroundColor: 'white',
  width: '100%',
  minHeight: 110,
};

/* ------------------ small UI bits ------------------ */

function Label({ children }: { children: ReactNode }) {
  return (
    <div style={{ color: '#4b5563', fontSize: 13, margin: '10px 0 4px' }}>
      {children}
    </div>
  );
}

function MultiSelect({
  label,
  options,
  value,
  onChange,
}: {
  label: string;
  options: { value: string; label: string }[];
  value: string[];
  onChange: (next: string[]) => void;
}) {
  return (
    <>
      <Label>{label}</Label>
      <select
        multiple
        aria-label={label}
        value={value}
        onChange={(e) =>
          onChange(Array.from(e.target.selectedOptions, (o) => o.value))
        }
        style={multi}
      >
        {options.map((o) => (
          <option key={o.value} value={o.value}>
            {o.label}
          </option>
        ))}
      </select>
    </>
  );
}

function Banner({ notice }: { notice: Notice }) {
  const isError = notice.level === 'error';
  return (
    <div
      role={isError ? 'alert' : 'status'}
      style={{
        padding: '8px 12px',
        borderRadius: 8,
        fontSize: 13,
        background: isError ? '#FEE2E2' : '#FEF3C7',
        color: isError ? '#991B1B' : '#92400E',
      }}
    >
      {notice.message}
    </div>
  );
}

function GroupView({ group }: { group: VersionGroup }) {
  if (group.status === 'empty') {
    return <Banner notice={{ level: 'warning', message: group.warning }} />;
  }

  return (
    <section style={{ ...section, display: 'grid', gap: 16 }}>
      <div style={{ fontSize: 22, fontWeight: 700 }}>Dashboard</div>
      <div style={{ display: 'flex', flexWrap: 'wrap', gap: 10, fontSize: 13 }}>
        <span>
          <b>Projects selected:</b> {group.projectNames.join(', ')}
        </span>
        <span>
          <b>Fix Version selected:</b> {group.version}
        </span>
      </div>

      <KpiRow kpis={group.kpis} />

      <div>
        <div style={{ fontSize: 16, fontWeight: 600, marginBottom: 8 }}>
          Data Summary:
        </div>
        <IssueTable rows={group.rows} />
      </div>

      {group.insightRows.length > 0 && (
        <div>
          <div style={{ fontSize: 16, fontWeight: 600, marginBottom: 8 }}>
            Insights:
          </div>
          {group.insightRows.map((pair, i) => (
            <div
              key={i}
              style={{
                display: 'grid',
                gridTemplateColumns: `repeat(${pair.length}, minmax(0, 1fr))`,
                gap: 16,
                marginBottom: 16,
              }}
            >
              {pair.map((chart) => (
                <InsightChart key={chart.insight} chart={chart} />
              ))}
            </div>
          ))}
        </div>
      )}
    </section>
  );
}

/* ------------------ page ------------------ */

export default function Page() {
  const [selection, setSelection] = useState<Selection>({
    projects: [],
    versions: [],
    insights: [...DEFAULT_INSIGHTS],
  });
  const [view, setView] = useState<DashboardView | null>(null);
  const [busy, setBusy] = useState(false);
  const [err, setErr] = useState<string | null>(null);

  // only the newest request may update the page
  const requestSeq = useRef(0);

  useEffect(() => {
    const seq = ++requestSeq.current;
    setBusy(true);
    setErr(null);

    fetchDashboard(selection)
      .then((next) => {
        if (seq !== requestSeq.current) return;
        setView(next);
        // drop picks the server ignored so they do not come back later
        setSelection((s) =>
          sameSelection(s, next.selection) ? s : next.selection
        );
      })
      .catch((e: unknown) => {
        if (seq !== requestSeq.current) return;
        setErr(e instanceof Error ? e.message : 'Update failed');
        // pickers keep their options so the selection can still be changed
        setView((prev) => (prev ? { ...prev, notice: null, groups: [] } : null));
      })
      .finally(() => {
        if (seq === requestSeq.current) setBusy(false);
      });
  }, [selection]);

  const projectOptions = (view?.projectOptions ?? []).map((p) => ({
    value: p.key,
    label: `${p.key} — ${p.name}`,
  }));
  const versionOptions = (view?.versionOptions ?? []).map((v) => ({
    value: v,
    label: v,
  }));
  const insightOptions = (view?.insightOptions ?? []).map((v) => ({
    value: v,
    label: v,
  }));

  return (
    <main
      style={{
        display: 'grid',
        gridTemplateColumns: '260px minmax(0, 1fr)',
        gap: 16,
        alignItems: 'start',
      }}
    >
      <aside style={section}>
        <div style={{ fontSize: 16, fontWeight: 700 }}>Filters</div>
        <MultiSelect
          label="Select Project"
          options={projectOptions}
          value={selection.projects}
          onChange={(projects) => setSelection((s) => ({ ...s, projects }))}
        />
        <MultiSelect
          label="Select Fix Versions"
          options={versionOptions}
          value={selection.versions}
          onChange={(versions) => setSelection((s) => ({ ...s, versions }))}
        />
        <MultiSelect
          label="Select Insights"
          options={insightOptions}
          value={selection.insights}
          onChange={(insights) => setSelection((s) => ({ ...s, insights }))}
        />
        {busy && (
          <div style={{ marginTop: 10, fontSize: 12, color: '#6b7280' }}>
            Loading…
          </div>
        )}
      </aside>

      <div style={{ display: 'grid', gap: 16 }}>
        {err && <Banner notice={{ level: 'error', message: err }} />}
        {view?.notice && <Banner notice={view.notice} />}
        {view?.groups.map((g) => (
          <GroupView key={g.version} group={g} />
        ))}
      </div>
    </main>
  );
}
