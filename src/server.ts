// src/server.ts
import cron from 'node-cron';
import { loadConfig, parseCliArgs, type EtlConfig } from './config';
import { ConfigError, describeError } from './errors';
import { buildAdapters, buildSheetPublisher, runEtl, type EtlResult } from './index';
import { ensureMetricsServer } from './metrics';

export type RunOnce = () => Promise<EtlResult>;

/** Wraps a run so a tick that fires while the previous run is still going is skipped. */
export function nonOverlapping(run: RunOnce): () => Promise<EtlResult | null> {
  let running = false;
  return async () => {
    if (running) {
      console.warn('[scheduler] previous run still in progress, skipping tick');
      return null;
    }
    running = true;
    try {
      return await run();
    } catch (err) {
      console.error('[scheduler] run failed', { error: describeError(err) });
      return null;
    } finally {
      running = false;
    }
  };
}

export function startScheduler(config: EtlConfig) {
  ensureMetricsServer(config.metricsPort);

  // fresh adapters and sink each tick: every run is independent
  const tick = nonOverlapping(() =>
    runEtl(config, { adapters: buildAdapters(config), sheet: buildSheetPublisher(config) }),
  );

  // Run immediately, then on schedule
  void tick();
  const task = cron.schedule(config.scheduleCron, () => {
    console.log(`[scheduler] tick (${config.scheduleCron})`, { sources: config.sources });
    void tick();
  });
  console.log('[scheduler] started', { cron: config.scheduleCron, metricsPort: config.metricsPort });
  return task;
}

if (require.main === module) {
  try {
    const task = startScheduler(loadConfig(process.env, parseCliArgs(process.argv.slice(2))));
    // graceful exit
    process.on('SIGTERM', () => {
      task.stop();
      process.exit(0);
    });
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error('[scheduler] configuration error', { error: err.message, missing: err.missing });
    process.exitCode = 1;
  }
}
