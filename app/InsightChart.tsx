// app/InsightChart.tsx
import type { InsightChartModel } from '../types';

const BAR_H = 22;
const BAR_GAP = 8;

function niceMax(v: number): number {
  if (v <= 5) return Math.max(1, v);
  const step = Math.pow(10, Math.floor(Math.log10(v)));
  return Math.ceil(v / step) * step;
}

function xTicks(max: number): number[] {
  const count = Math.min(max, 5);
  const step = max / count;
  const out: number[] = [];
  for (let i = 0; i <= count; i++) out.push(Math.round(i * step * 10) / 10);
  return out;
}

/** Horizontal bar chart: one bar per category, length = count. */
export function InsightChart({ chart }: { chart: InsightChartModel }) {
  const { title, categoryAxisTitle, valueAxisTitle, bars } = chart;

  /* ---------- chart frame ---------- */

  const width = 560;
  const padLeft = 150;
  const padRight = 36;
  const padTop = 10;
  const padBottom = 40;

  const plotH = Math.max(1, bars.length) * (BAR_H + BAR_GAP);
  const height = padTop + plotH + padBottom;
  const plotW = width - padLeft - padRight;

  const maxCount = niceMax(Math.max(0, ...bars.map((b) => b.count)));
  const xForVal = (v: number) => padLeft + (v / maxCount) * plotW;
  const yForIndex = (i: number) => padTop + i * (BAR_H + BAR_GAP) + BAR_GAP / 2;

  const short = (s: string) => (s.length > 22 ? `${s.slice(0, 21)}…` : s);

  return (
    <figure style={{ margin: 0 }}>
      <figcaption style={{ fontSize: 14, fontWeight: 600, marginBottom: 6 }}>
        {title}
      </figcaption>
      <svg
        width="100%"
        viewBox={`0 0 ${width} ${height}`}
        role="img"
        aria-label={title}
      >
        {/* X grid + labels */}
        {xTicks(maxCount).map((v) => {
          const x = xForVal(v);
          return (
            <g key={`tick-${v}`}>
              <line
                x1={x}
                y1={padTop}
                x2={x}
                y2={padTop + plotH}
                stroke={v === 0 ? '#9ca3af' : '#f3f4f6'}
                strokeWidth={1}
              />
              <text
                x={x}
                y={padTop + plotH + 14}
                fontSize={10}
                textAnchor="middle"
                fill="#6b7280"
              >
                {v}
              </text>
            </g>
          );
        })}

        {/* Bars */}
        {bars.map((b, i) => {
          const y = yForIndex(i);
          return (
            <g key={`bar-${i}`} data-testid="insight-bar">
              <title>{`${b.label}: ${b.count}`}</title>
              <text
                x={padLeft - 8}
                y={y + BAR_H / 2 + 4}
                fontSize={11}
                textAnchor="end"
                fill="#374151"
              >
                {short(b.label)}
              </text>
              <rect
                x={padLeft}
                y={y}
                width={Math.max(0, xForVal(b.count) - padLeft)}
                height={BAR_H}
                rx={3}
                fill={b.color}
              />
              <text
                x={xForVal(b.count) + 4}
                y={y + BAR_H / 2 + 4}
                fontSize={10}
                fill="#111827"
                fontWeight={600}
              >
                {b.count}
              </text>
            </g>
          );
        })}

        {/* Axis titles */}
        <text
          x={padLeft + plotW / 2}
          y={height - 6}
          fontSize={11}
          textAnchor="middle"
          fill="#4b5563"
        >
          {valueAxisTitle}
        </text>
        <text
          x={12}
          y={padTop + plotH / 2}
          fontSize={11}
          textAnchor="middle"
          fill="#4b5563"
          transform={`rotate(-90 12 ${padTop + plotH / 2})`}
        >
          {categoryAxisTitle}
        </text>
      </svg>
    </figure>
  );
}
