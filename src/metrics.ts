// src/metrics.ts
import http from 'http';
import client from 'prom-client';
import type { ReconcileStats } from './matching/types';

export const registry = new client.Registry();
client.collectDefaultMetrics({ register: registry });

const eventsGauge = new client.Gauge({
  name: 'etl_source_events_count',
  help: 'Events returned by a source in the last run',
  labelNames: ['source'] as const,
});
const pairsGauge = new client.Gauge({
  name: 'etl_matched_pairs_count',
  help: 'Matched pairs in the last run, by linking rule',
  labelNames: ['rule'] as const,
});
const singletonsGauge = new client.Gauge({
  name: 'etl_singleton_rows_count',
  help: 'Unmatched rows in the last run, by side',
  labelNames: ['source'] as const,
});
const adapterFailures = new client.Counter({
  name: 'etl_adapter_failures_total',
  help: 'Source adapter runs that failed and contributed no events',
  labelNames: ['source'] as const,
});
const sinkFailures = new client.Counter({
  name: 'etl_sink_failures_total',
  help: 'Sink publications that failed',
  labelNames: ['sink'] as const,
});
const durationGauge = new client.Gauge({
  name: 'etl_run_duration_seconds',
  help: 'Wall time of the last run',
});
const lastSuccessGauge = new client.Gauge({
  name: 'etl_last_success_timestamp_seconds',
  help: 'Unix time of the last run that published its table',
});

registry.registerMetric(eventsGauge);
registry.registerMetric(pairsGauge);
registry.registerMetric(singletonsGauge);
registry.registerMetric(adapterFailures);
registry.registerMetric(sinkFailures);
registry.registerMetric(durationGauge);
registry.registerMetric(lastSuccessGauge);

export function recordSourceEvents(source: string, count: number) {
  eventsGauge.set({ source }, count);
}

export function recordAdapterFailure(source: string) {
  adapterFailures.inc({ source });
}

export function recordSinkFailure(sink: string) {
  sinkFailures.inc({ sink });
}

/** Report one run snapshot */
export function reportRunMetrics(opts: {
  stats: ReconcileStats;
  labels: { a: string; b: string };
  durationSeconds: number;
  succeeded: boolean;
}) {
  for (const [rule, count] of Object.entries(opts.stats.pairsByRule)) {
    pairsGauge.set({ rule }, count);
  }
  singletonsGauge.set({ source: opts.labels.a }, opts.stats.singletonsA);
  singletonsGauge.set({ source: opts.labels.b }, opts.stats.singletonsB);
  durationGauge.set(opts.durationSeconds);
  if (opts.succeeded) lastSuccessGauge.setToCurrentTime();
}

/** One-shot runs have no scrape target; hand the registry to a Pushgateway instead. */
export async function pushRunMetrics(gatewayUrl: string, jobName = 'concert_sales_sync') {
  const gateway = new client.Pushgateway(gatewayUrl, {}, registry);
  await gateway.pushAdd({ jobName });
  console.log('[metrics] pushed to gateway', { gatewayUrl, jobName });
}

// Start a simple /metrics server
let server: http.Server | null = null;
export function ensureMetricsServer(port: number): http.Server {
  if (server) return server;
  server = http.createServer((req, res) => {
    if (req.url && !req.url.startsWith('/metrics')) {
      res.statusCode = 404;
      res.end('not found');
      return;
    }
    registry
      .metrics()
      .then(body => {
        res.setHeader('Content-Type', registry.contentType);
        res.end(body);
      })
      .catch((err: unknown) => {
        console.error('[metrics] could not render registry', err);
        res.statusCode = 500;
        res.end();
      });
  });
  server.listen(port, () => console.log(`[metrics] listening on :${port} /metrics`));
  return server;
}
