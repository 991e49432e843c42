import type { ResolvedCollectionConfig } from '../config/resolved-config.types.js';
import type { MediaTools } from '../downloader/types.js';
import { errorMessage } from '../errors/custom-errors.js';
import { runWorkerPool } from '../queue/worker-pool.js';
import type { Logger } from '../utils/logger.js';
import { SyncOrchestrator, type SyncOrchestratorDeps } from './sync-orchestrator.js';
import type { SyncReport } from './sync-report.js';

/**
 * What one worker saw. Owned by that worker alone until the merge.
 */
export type WorkerTally = {
  workerId: number;
  reports: Array<{ index: number; report: SyncReport }>;
  crashed: Array<{ index: number; label: string; error: string }>;
};

export type BatchTotals = {
  fetched: number;
  skippedPermanent: number;
  failed: number;
  violations: number;
  subtitlesRecovered: number;
  subtitlesFailed: number;
};

export type BatchSummary = {
  /** In configuration order */
  reports: SyncReport[];
  crashed: Array<{ label: string; error: string }>;
  totals: BatchTotals;
};

export type BatchRunnerOptions = {
  tools: MediaTools;
  log: Logger;
  concurrency: number;
  /** Extra options for every collection run */
  orchestrator?: Omit<SyncOrchestratorDeps, 'config' | 'tools' | 'log'>;
};

/**
 * Merge per-worker tallies after every worker has finished
 */
export function mergeTallies(tallies: readonly WorkerTally[]): BatchSummary {
  const reports = tallies
    .flatMap((tally) => tally.reports)
    .sort((a, b) => a.index - b.index)
    .map((entry) => entry.report);
  const crashed = tallies
    .flatMap((tally) => tally.crashed)
    .sort((a, b) => a.index - b.index)
    .map(({ label, error }) => ({ label, error }));

  const totals: BatchTotals = {
    fetched: 0,
    skippedPermanent: 0,
    failed: 0,
    violations: 0,
    subtitlesRecovered: 0,
    subtitlesFailed: 0,
  };
  for (const report of reports) {
    totals.fetched += report.fetched;
    totals.skippedPermanent += report.skippedPermanent;
    totals.failed += report.failed;
    totals.violations += report.violations;
    totals.subtitlesRecovered += report.subtitles.recovered;
    totals.subtitlesFailed += report.subtitles.failed;
  }

  return { reports, crashed, totals };
}

/**
 * Sync every collection with a bounded number of collections in flight.
 * A collection that throws is logged and counted; the rest carry on.
 */
export async function runBatch(
  configs: readonly ResolvedCollectionConfig[],
  options: BatchRunnerOptions,
): Promise<BatchSummary> {
  const { tools, log, concurrency } = options;

  const tallies = await runWorkerPool(
    configs,
    concurrency,
    (workerId): WorkerTally => ({ workerId, reports: [], crashed: [] }),
    async (config, tally, index) => {
      const label = `${config.collection.displayName} ${config.collection.seasonTag}`;
      const orchestrator = new SyncOrchestrator({
        ...options.orchestrator,
        config,
        tools,
        log: log.child(label),
      });

      try {
        tally.reports.push({ index, report: await orchestrator.run() });
      } catch (error) {
        const message = errorMessage(error);
        log.error(`Collection ${label} aborted in ${orchestrator.currentPhase}: ${message}`);
        tally.crashed.push({ index, label, error: message });
      }
    },
  );

  return mergeTallies(tallies);
}
