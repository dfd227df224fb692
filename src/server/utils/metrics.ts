import { Registry, Counter, Histogram } from 'prom-client';

/**
 * Prometheus metrics registry
 */
export const metricsRegistry = new Registry();

/**
 * Remote API Metrics
 * Labels: operation ('list_projects' | 'list_todos_page' | 'get_todo'), outcome ('success' | 'error')
 */
export const basecampRequestsTotal = new Counter({
  name: 'basecamp_requests_total',
  help: 'Total number of requests sent to the Basecamp API',
  labelNames: ['operation', 'outcome'],
  registers: [metricsRegistry],
});

/**
 * Ingestion Metrics
 */
export const documentsEnqueuedTotal = new Counter({
  name: 'ingestion_documents_enqueued_total',
  help: 'Total number of top-level documents handed to the index queue',
  labelNames: ['data_source'],
  registers: [metricsRegistry],
});

export const recordsSkippedTotal = new Counter({
  name: 'ingestion_records_skipped_total',
  help: 'Total number of task items skipped because the record was malformed',
  labelNames: ['data_source', 'reason'],
  registers: [metricsRegistry],
});

export const unitsFailedTotal = new Counter({
  name: 'ingestion_units_failed_total',
  help: 'Total number of per-project processing units that failed',
  labelNames: ['data_source', 'reason'],
  registers: [metricsRegistry],
});

export const ingestionRunDuration = new Histogram({
  name: 'ingestion_run_duration_seconds',
  help: 'Duration of complete ingestion runs in seconds',
  labelNames: ['data_source', 'outcome'],
  buckets: [1, 5, 15, 60, 300, 900, 3600],
  registers: [metricsRegistry],
});
