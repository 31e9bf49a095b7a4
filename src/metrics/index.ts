import { Counter, Histogram, Registry } from 'prom-client';
import fs from 'fs/promises';
import path from 'path';

export const registry = new Registry();

export const runsTotal = new Counter({
  name: 'transit_runs_total',
  help: 'Reconciliation runs by terminal outcome',
  labelNames: ['outcome', 'kind'] as const, // outcome=done|failed, kind=failure kind or "none"
  registers: [registry],
});

export const incidentsFetchedTotal = new Counter({
  name: 'transit_incidents_fetched_total',
  help: 'Raw incident records received from the feed',
  registers: [registry],
});

export const incidentsNotifiedTotal = new Counter({
  name: 'transit_incidents_notified_total',
  help: 'Incidents included in a successfully sent notification',
  registers: [registry],
});

export const notificationsSentTotal = new Counter({
  name: 'transit_notifications_total',
  help: 'Notification send attempts by transport and result',
  labelNames: ['adapter', 'status'] as const,
  registers: [registry],
});

export const runDurationSeconds = new Histogram({
  name: 'transit_run_duration_seconds',
  help: 'Wall time of a reconciliation run (seconds)',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [registry],
});

/** Writes the registry in Prometheus text format, for a node_exporter textfile collector. */
export async function writeMetricsTextfile(file: string): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(file)), { recursive: true });
  const tmp = `${file}.${process.pid}.tmp`;
  await fs.writeFile(tmp, await registry.metrics());
  await fs.rename(tmp, file);
}
