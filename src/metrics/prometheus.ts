export type Labels = Record<string, string>;

export interface GaugeSample {
  value: number;
  labels?: Labels;
  /** Orders samples ahead of the label-string fallback. */
  rank?: number;
}

export interface RenderOptions {
  help?: string;
  labels?: Labels;
}

export interface HistogramData {
  buckets: readonly number[];
  /** Count per bucket upper bound; the last entry holds observations past every bound. */
  counts: readonly number[];
  sum: number;
}

const LABEL_ESCAPES: Record<string, string> = { '\\': '\\\\', '\n': '\\n', '"': '\\"' };

export function metricName(raw: string): string {
  const name = raw
    .replace(/[^A-Za-z0-9_]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '')
    .toLowerCase();
  if (name.length === 0) {
    return 'loopback_metric';
  }
  return /^\d/.test(name) ? `loopback_${name}` : name;
}

export function formatValue(value: number): string {
  if (!Number.isFinite(value) || value === 0) {
    return '0';
  }
  if (Number.isInteger(value)) {
    return String(value);
  }
  return value.toFixed(6).replace(/\.?0+$/, '') || '0';
}

export function formatLabels(labels: Labels): string {
  const pairs = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}="${value.replace(/[\\\n"]/g, ch => LABEL_ESCAPES[ch] ?? ch)}"`);
  return pairs.length > 0 ? `{${pairs.join(',')}}` : '';
}

function header(name: string, type: 'gauge' | 'histogram', help: string | undefined): string[] {
  const lines = help ? [`# HELP ${name} ${help.replace(/\\/g, '\\\\').replace(/\n/g, ' ')}`] : [];
  lines.push(`# TYPE ${name} ${type}`);
  return lines;
}

/** Empty string when no sample carries a finite value. */
export function renderGauge(rawName: string, samples: readonly GaugeSample[], options: RenderOptions = {}): string {
  const base = options.labels ?? {};
  const rows = samples
    .filter(sample => Number.isFinite(sample.value))
    .map(sample => ({ ...sample, labelText: formatLabels({ ...base, ...sample.labels }) }))
    .sort((a, b) => {
      if (a.rank !== undefined && b.rank !== undefined && a.rank !== b.rank) {
        return a.rank - b.rank;
      }
      return a.labelText.localeCompare(b.labelText);
    });
  if (rows.length === 0) {
    return '';
  }

  const name = metricName(rawName);
  const lines = header(name, 'gauge', options.help);
  for (const row of rows) {
    lines.push(`${name}${row.labelText} ${formatValue(row.value)}`);
  }
  return lines.join('\n');
}

export function renderHistogram(rawName: string, data: HistogramData, options: RenderOptions = {}): string {
  const name = metricName(rawName);
  const base = options.labels ?? {};
  const lines = header(name, 'histogram', options.help);

  let running = 0;
  data.buckets.forEach((bound, index) => {
    running += data.counts[index] ?? 0;
    lines.push(`${name}_bucket${formatLabels({ ...base, le: formatValue(bound) })} ${formatValue(running)}`);
  });
  const total = running + (data.counts[data.buckets.length] ?? 0);
  lines.push(`${name}_bucket${formatLabels({ ...base, le: '+Inf' })} ${formatValue(total)}`);
  lines.push(`${name}_sum${formatLabels(base)} ${formatValue(data.sum)}`);
  lines.push(`${name}_count${formatLabels(base)} ${formatValue(total)}`);
  return lines.join('\n');
}
