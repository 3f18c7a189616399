// packages/pipeline-backend/src/infrastructure/metrics.ts

// Minimal metrics facade for the pipeline.
// Names in use:
//   jobs.created, jobs.completed, jobs.failed, jobs.cancelled       (counters)
//   stage.processed{stage,result}                                   (counter)
//   stage.duration_ms{stage}                                        (timing)
// The default implementation is noop; swap the exported `metrics` to plug in a backend.

export interface MetricsTags {
  [key: string]: string | number | boolean | undefined;
}

export interface Metrics {
  increment(name: string, value?: number, tags?: MetricsTags): void;
  timing(name: string, ms: number, tags?: MetricsTags): void;
}

// metrics.declaration()
export const metrics: Metrics = {
  increment() {},
  timing() {},
};
