type Labels = Record<string, string>;

interface CounterSeries {
  labels: Labels;
  value: number;
}

interface SummarySeries {
  labels: Labels;
  count: number;
  sum: number;
}

interface Metric<S> {
  help: string;
  series: Map<string, S>;
}

function labelsKey(labels: Labels): string {
  return Object.keys(labels)
    .sort()
    .map(k => `${k}=${labels[k]}`)
    .join('|');
}

function formatLabels(labels: Labels): string {
  const entries = Object.keys(labels)
    .sort()
    .map(k => `${k}="${labels[k]}"`);
  return entries.length ? `{${entries.join(',')}}` : '';
}

function seriesFor<S>(registry: Map<string, Metric<S>>, name: string, help: string): Map<string, S> {
  let metric = registry.get(name);
  if (!metric) {
    metric = { help, series: new Map() };
    registry.set(name, metric);
  }
  return metric.series;
}

/** HELP and TYPE header per metric, then its samples ordered by label set. */
function renderFamilies<S extends { labels: Labels }>(
  registry: Map<string, Metric<S>>,
  type: 'counter' | 'summary',
  samples: (name: string, labels: string, entry: S) => string[],
): string[] {
  const lines: string[] = [];
  for (const [name, metric] of registry) {
    lines.push(`# HELP ${name} ${metric.help}`.trim(), `# TYPE ${name} ${type}`);
    const ordered = [...metric.series.values()].sort((a, b) => labelsKey(a.labels).localeCompare(labelsKey(b.labels)));
    for (const entry of ordered) {
      lines.push(...samples(name, formatLabels(entry.labels), entry));
    }
  }
  return lines;
}

export class MetricsRegistry {
  private counters = new Map<string, Metric<CounterSeries>>();
  private summaries = new Map<string, Metric<SummarySeries>>();

  reset(): void {
    this.counters.clear();
    this.summaries.clear();
  }

  inc(name: string, labels: Labels = {}, help = ''): void {
    const series = seriesFor(this.counters, name, help);
    const key = labelsKey(labels);
    const entry = series.get(key) ?? { labels, value: 0 };
    entry.value += 1;
    series.set(key, entry);
  }

  observe(name: string, value: number, labels: Labels = {}, help = ''): void {
    const series = seriesFor(this.summaries, name, help);
    const key = labelsKey(labels);
    const entry = series.get(key) ?? { labels, count: 0, sum: 0 };
    entry.count += 1;
    entry.sum += value;
    series.set(key, entry);
  }

  counterValue(name: string, labels: Labels = {}): number {
    return this.counters.get(name)?.series.get(labelsKey(labels))?.value ?? 0;
  }

  exportPrometheus(): string {
    return [
      ...renderFamilies(this.counters, 'counter', (name, labels, entry) => [`${name}${labels} ${entry.value}`]),
      ...renderFamilies(this.summaries, 'summary', (name, labels, entry) => [
        `${name}_sum${labels} ${entry.sum}`,
        `${name}_count${labels} ${entry.count}`,
      ]),
    ].join('\n');
  }
}

export const metrics = new MetricsRegistry();

export function recordOperation(operation: string, outcome: string, durationMs: number): void {
  metrics.inc('canopy_operations_total', { operation, outcome }, 'Workflow operations');
  metrics.observe('canopy_operation_duration_ms', durationMs, { operation }, 'Workflow operation duration (ms)');
}

export function recordPermissionDenied(operation: string, capability: string): void {
  metrics.inc('canopy_permission_denials_total', { operation, capability }, 'Rejected permission checks');
}

export function recordMaterialization(kind: 'created' | 'refreshed'): void {
  metrics.inc('canopy_materializations_total', { kind }, 'Public counterparts written');
}

export function recordPromotion(): void {
  metrics.inc('canopy_promotions_total', {}, 'Nodes promoted after an ancestor was published');
}

export function recordRetraction(count: number): void {
  metrics.observe('canopy_retracted_counterparts', count, {}, 'Counterparts removed per retraction');
}
