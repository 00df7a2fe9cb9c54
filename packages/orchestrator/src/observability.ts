export type PipelineLogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface PipelineLogEvent {
  level: PipelineLogLevel;
  /** `stage.<name>.start|success|retry|failed`, or `run.*` for run-level events. */
  message: string;
  runId?: string;
  stage?: string;
  detail?: Record<string, unknown>;
}

export interface PipelineLogger {
  log: (event: PipelineLogEvent) => void;
}

export interface PipelineMetrics {
  timing: (metric: string, durationMs: number, tags?: Record<string, string>) => void;
  increment: (metric: string, value?: number, tags?: Record<string, string>) => void;
}

export const noopLogger: PipelineLogger = {
  log: () => {
    /* noop */
  },
};

export const noopMetrics: PipelineMetrics = {
  timing: () => {
    /* noop */
  },
  increment: () => {
    /* noop */
  },
};

export interface MetricsSnapshot {
  counters: Record<string, number>;
  timings: Record<string, { count: number; totalMs: number; maxMs: number }>;
}

/** Keys are the metric name plus its sorted tags, e.g. `narrator.stage.retry{stage=upload}`. */
export function metricKey(metric: string, tags?: Record<string, string>): string {
  const entries = Object.entries(tags ?? {}).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  if (entries.length === 0) return metric;
  return `${metric}{${entries.map(([k, v]) => `${k}=${v}`).join(',')}}`;
}

/** Aggregates metrics in memory; the CLI attaches the snapshot to `--json` output. */
export function createMetricsRecorder(): PipelineMetrics & { snapshot: () => MetricsSnapshot } {
  const counters: MetricsSnapshot['counters'] = {};
  const timings: MetricsSnapshot['timings'] = {};

  return {
    increment(metric, value = 1, tags) {
      const key = metricKey(metric, tags);
      counters[key] = (counters[key] ?? 0) + value;
    },
    timing(metric, durationMs, tags) {
      const key = metricKey(metric, tags);
      const current = timings[key] ?? { count: 0, totalMs: 0, maxMs: 0 };
      timings[key] = {
        count: current.count + 1,
        totalMs: current.totalMs + durationMs,
        maxMs: Math.max(current.maxMs, durationMs),
      };
    },
    snapshot: () => ({ counters: { ...counters }, timings: { ...timings } }),
  };
}
