#!/usr/bin/env node
// src/index.ts
import crypto from 'crypto';
import { loadConfig, parseCliArgs, type EtlConfig } from './config';
import { ConfigError, SinkError, describeError } from './errors';
import { reconcile } from './matching/reconcile';
import { projectTable } from './matching/project_rows';
import type { OutputTable, RawEventRecord, ReconcileStats } from './matching/types';
import { pushRunMetrics, recordSinkFailure, recordSourceEvents, reportRunMetrics } from './metrics';
import { CsvTableSink, writeSourceCsv } from './sinks/csv_export';
import { GoogleSheetsSink, createSheetsApi } from './sinks/google_sheets';
import { buildPreview, writePreview } from './sinks/preview';
import { labelRecords, type LabelledRecord, type TableSink } from './sinks/sink';
import { collectEvents, type AdapterContext, type EventSourceAdapter } from './sites/adapter';
import { DiceAdapter } from './sites/dice';
import { ShotgunAdapter } from './sites/shotgun';

export const EXIT_OK = 0;
export const EXIT_CONFIG = 1;
export const EXIT_NO_DATA = 2;
export const EXIT_SINK = 3;

/** Publisher of the consolidated table that also keeps the raw-record history. */
export interface SheetPublisher extends TableSink {
  appendHistory(records: readonly LabelledRecord[]): Promise<void>;
}

export type EtlDeps = {
  adapters: EventSourceAdapter[];
  sheet: SheetPublisher | null;
  now?: () => Date;
  runId?: string;
};

export type EtlResult = {
  exitCode: number;
  runId: string;
  table: OutputTable | null;
  stats: ReconcileStats | null;
};

export function newRunId(at: Date): string {
  const stamp = at.toISOString().replace(/[-:]/g, '').replace(/\.\d+Z$/, 'Z');
  return `${stamp}-${crypto.randomBytes(3).toString('hex')}`;
}

export function buildAdapters(config: EtlConfig): EventSourceAdapter[] {
  return config.sources.map(source =>
    source === 'shotgun'
      ? new ShotgunAdapter(config.shotgun, config.browser, config.retry)
      : new DiceAdapter(config.dice, config.retry),
  );
}

export function buildSheetPublisher(config: EtlConfig): SheetPublisher | null {
  if (!config.sheet.enabled) return null;
  return new GoogleSheetsSink(createSheetsApi(config.sheet.credentialsPath), config.sheet);
}

async function pushMetrics(config: EtlConfig) {
  if (!config.pushgatewayUrl) return;
  try {
    await pushRunMetrics(config.pushgatewayUrl);
  } catch (err) {
    console.warn('[metrics] push to gateway failed', { error: describeError(err) });
  }
}

type Step = [name: string, write: () => Promise<void> | void];

/** Runs one publish step; a `SinkError` is logged and counted, and the step reports false. */
async function guardSink([step, write]: Step): Promise<boolean> {
  try {
    await write();
    return true;
  } catch (err) {
    if (!(err instanceof SinkError)) throw err;
    console.error('[etl] publish step failed', { step, sink: err.sink, error: err.message });
    recordSinkFailure(err.sink);
    return false;
  }
}

/**
 * One run: both adapters concurrently, then reconcile, project and publish.
 * Local artifacts are written before the sheet so a sheet failure leaves them behind.
 */
export async function runEtl(config: EtlConfig, deps: EtlDeps): Promise<EtlResult> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const runId = deps.runId ?? newRunId(startedAt);
  const ctx: AdapterContext = { runId, scrapedAt: startedAt };
  const { labels } = config;

  console.log('[etl] run started', { runId, sources: deps.adapters.map(a => a.name), dryRun: config.dryRun });

  const results = await Promise.all(deps.adapters.map(adapter => collectEvents(adapter, ctx)));
  const bySource = new Map<string, RawEventRecord[]>();
  deps.adapters.forEach((adapter, i) => {
    bySource.set(adapter.name, results[i]);
    recordSourceEvents(adapter.name, results[i].length);
  });
  const recordsA = bySource.get(labels.a) ?? [];
  const recordsB = bySource.get(labels.b) ?? [];
  console.log('[etl] events collected', { [labels.a]: recordsA.length, [labels.b]: recordsB.length });

  if (recordsA.length === 0 && recordsB.length === 0) {
    console.warn('[etl] no events from any source, nothing published', { runId });
    await pushMetrics(config);
    return { exitCode: EXIT_NO_DATA, runId, table: null, stats: null };
  }

  const { rows, stats } = reconcile(recordsA, recordsB, config.matcher, { reference: startedAt });
  const table = projectTable(rows, labels);
  console.log('[etl] reconciled', { ...stats, rows: table.rows.length });

  const history = [...labelRecords(labels.a, recordsA), ...labelRecords(labels.b, recordsB)];
  const { sheet } = deps;
  const steps: Step[] = [
    ['consolidated csv', () => new CsvTableSink(config.exports.csvDir, () => startedAt).publish(table)],
    ...[labels.a, labels.b].map((label): Step => [
      `${label} csv`,
      () => {
        writeSourceCsv(config.exports.csvDir, label, history.filter(h => h.provider === label), startedAt);
      },
    ]),
    [
      'preview',
      () => writePreview(config.exports.previewPath, buildPreview({ labels, recordsA, recordsB, table, limit: config.exports.previewLimit })),
    ],
  ];
  if (sheet) {
    steps.push([
      'sheet',
      async () => {
        await sheet.publish(table);
        await sheet.appendHistory(history);
      },
    ]);
  } else {
    console.log('[etl] sheet publishing disabled', { dryRun: config.dryRun });
  }

  // each step runs even when an earlier one failed
  let exitCode = EXIT_OK;
  for (const step of steps) {
    if (!(await guardSink(step))) exitCode = EXIT_SINK;
  }

  const durationSeconds = (now().getTime() - startedAt.getTime()) / 1000;
  reportRunMetrics({ stats, labels, durationSeconds, succeeded: exitCode === EXIT_OK });
  await pushMetrics(config);
  console.log('[etl] run finished', { runId, exitCode, durationSeconds });

  return { exitCode, runId, table, stats };
}

/** CLI entry: flags override the environment; returns the process exit code. */
export async function main(argv: readonly string[]): Promise<number> {
  let config: EtlConfig;
  try {
    config = loadConfig(process.env, parseCliArgs(argv));
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error('[etl] configuration error', { error: err.message, missing: err.missing });
    return EXIT_CONFIG;
  }
  const result = await runEtl(config, { adapters: buildAdapters(config), sheet: buildSheetPublisher(config) });
  return result.exitCode;
}

/** ---------- manual run ---------- */
if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error('[etl] run crashed', err);
      process.exitCode = 1;
    });
}
