import { existsSync } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { MediaTools } from '../downloader/types.js';
import { ConfigError, errorMessage } from '../errors/custom-errors.js';
import { runWorkerPool } from '../queue/worker-pool.js';
import { AuditLog } from '../state/audit-log.js';
import type { Logger } from '../utils/logger.js';

export const TRAILER_LOG_NAME = 'trailers.log';

export type TrailerTally = {
  fetched: number;
  present: number;
  failed: number;
};

export type TrailerBatchOptions = {
  root: string;
  concurrency: number;
  tools: Pick<MediaTools, 'fetchTrailer'>;
  log: Logger;
  now?: () => Date;
};

export function trailerBaseName(folder: string): string {
  return `${folder}-trailer`;
}

async function hasTrailer(folderPath: string, folder: string): Promise<boolean> {
  const prefix = `${trailerBaseName(folder)}.`;
  const entries = await readdir(folderPath);
  return entries.some((entry) => entry.startsWith(prefix) && !entry.endsWith('.part'));
}

async function fetchFolderTrailer(
  folder: string,
  tally: TrailerTally,
  options: TrailerBatchOptions & { audit: AuditLog },
): Promise<void> {
  // Counted only once the audit line is written; a throw is tallied by the caller
  const { root, tools, log, audit } = options;
  const folderPath = join(root, folder);
  if (await hasTrailer(folderPath, folder)) {
    log.debug(`${folder}: trailer present`);
    tally.present++;
    return;
  }

  const query = `${folder} trailer`;
  const result = await tools.fetchTrailer({ query, outputBase: join(folderPath, trailerBaseName(folder)) });

  if (result.exitCode === 0 && (await hasTrailer(folderPath, folder))) {
    log.success(`${folder}: trailer fetched`);
    await audit.write(`TRAILER ${folder}: ${query}`);
    tally.fetched++;
    return;
  }

  const reason = result.output.split('\n').filter(Boolean).pop() ?? `exit code ${result.exitCode}`;
  log.warning(`${folder}: no trailer (${reason})`);
  await audit.write(`TRAILER-FAILED ${folder}: ${reason}`);
  tally.failed++;
}

/**
 * Fetch one trailer into every immediate subfolder of `root` that lacks one.
 *
 * Folders are independent: a folder that fails is counted and logged and the
 * rest carry on. The only shared file is `<root>/trailers.log`, written one
 * entry per append.
 */
export async function runTrailerBatch(options: TrailerBatchOptions): Promise<TrailerTally> {
  const { root, concurrency, tools, log } = options;
  if (!existsSync(root)) {
    throw new ConfigError(`Trailer root not found: ${root}`);
  }

  const folders = (await readdir(root, { withFileTypes: true }))
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
  const audit = new AuditLog(join(root, TRAILER_LOG_NAME), options.now);

  log.info(`Checking ${folders.length} folder(s) for trailers with ${concurrency} worker(s)`);

  const tallies = await runWorkerPool(
    folders,
    concurrency,
    (): TrailerTally => ({ fetched: 0, present: 0, failed: 0 }),
    async (folder, tally) => {
      try {
        await fetchFolderTrailer(folder, tally, { ...options, audit });
      } catch (error) {
        const message = errorMessage(error);
        tally.failed++;
        log.error(`${folder}: ${message}`);
        await audit.write(`TRAILER-FAILED ${folder}: ${message}`).catch((auditError: unknown) => {
          log.error(`Failed to write ${TRAILER_LOG_NAME}: ${errorMessage(auditError)}`);
        });
      }
    },
  );

  return mergeTrailerTallies(tallies);
}

export function mergeTrailerTallies(tallies: readonly TrailerTally[]): TrailerTally {
  return tallies.reduce(
    (total, tally) => ({
      fetched: total.fetched + tally.fetched,
      present: total.present + tally.present,
      failed: total.failed + tally.failed,
    }),
    { fetched: 0, present: 0, failed: 0 },
  );
}
