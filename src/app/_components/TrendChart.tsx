type Props = {
  title: string;
  labels: string[];
  values: number[];
  formatValue: (value: number) => string;
  stroke?: string;
};

const CHART_WIDTH = 640;
const CHART_HEIGHT = 180;
const PAD_X = 32;
const PAD_Y = 20;

export default function TrendChart({ title, labels, values, formatValue, stroke = "#111827" }: Props) {
  const hasTrend = values.length >= 2;
  const max = Math.max(...values, 0);
  const min = Math.min(...values, 0);
  const span = max - min || 1;

  const points = values.map((value, idx) => {
    const x = PAD_X + (idx / Math.max(1, values.length - 1)) * (CHART_WIDTH - PAD_X * 2);
    const y = CHART_HEIGHT - PAD_Y - ((value - min) / span) * (CHART_HEIGHT - PAD_Y * 2);
    return { x, y, value, label: labels[idx] ?? "" };
  });
  const path = points.map((point, idx) => `${idx === 0 ? "M" : "L"}${point.x.toFixed(1)},${point.y.toFixed(1)}`).join(" ");

  return (
    <div className="rounded-xl border border-black/10 bg-white p-4 dark:border-white/10 dark:bg-white/5">
      <div className="flex flex-wrap items-center justify-between gap-3">
        <div className="text-xs uppercase tracking-wide text-zinc-500 dark:text-zinc-400">{title}</div>
        <div className="text-xs text-zinc-500 dark:text-zinc-400">{values.length} points</div>
      </div>
      <div className="mt-4 overflow-x-auto">
        {hasTrend ? (
          <svg className="w-full" viewBox={`0 0 ${CHART_WIDTH} ${CHART_HEIGHT}`} role="img" aria-label={title}>
            <line x1={PAD_X} y1={PAD_Y} x2={PAD_X} y2={CHART_HEIGHT - PAD_Y} stroke="rgba(0,0,0,0.15)" strokeWidth="1" />
            <line
              x1={PAD_X}
              y1={CHART_HEIGHT - PAD_Y}
              x2={CHART_WIDTH - PAD_X}
              y2={CHART_HEIGHT - PAD_Y}
              stroke="rgba(0,0,0,0.15)"
              strokeWidth="1"
            />
            <path d={path} fill="none" stroke={stroke} strokeWidth="2" />
            {points.map((point, idx) => (
              <circle key={`p-${idx}`} cx={point.x} cy={point.y} r={3} fill={stroke}>
                <title>{`${point.label}: ${formatValue(point.value)}`}</title>
              </circle>
            ))}
          </svg>
        ) : (
          <div className="text-sm text-zinc-600 dark:text-zinc-400">Not enough games for a trend chart.</div>
        )}
      </div>
    </div>
  );
}
