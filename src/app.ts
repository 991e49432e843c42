import { boolean, command, flag, number, option, optional, string, subcommands } from 'cmd-ts';
import { DEFAULT_CONFIG_PATH, DEFAULT_TRAILER_CONCURRENCY } from './config/config-defaults.js';
import { loadConfig } from './config/config-loader.js';
import { ConfigResolver } from './config/config-resolver.js';
import type { ResolvedTools } from './config/resolved-config.types.js';
import { createMediaTools } from './downloader/media-tools.js';
import type { MediaTools, ToolCheck } from './downloader/types.js';
import { ConfigError, errorMessage, MissingToolError } from './errors/custom-errors.js';
import { type BatchSummary, runBatch } from './sync/batch-runner.js';
import { runTrailerBatch, type TrailerTally } from './trailers/trailer-batch.js';
import { logger, LogLevel, parseLogLevel } from './utils/logger.js';
import { formatDuration } from './utils/time-utils.js';

export type AppDependencies = {
  loadConfig: typeof loadConfig;
  createMediaTools: (tools: ResolvedTools) => MediaTools & ToolCheck;
  /** Forwarded to every fetch cascade */
  sleep?: (ms: number) => Promise<void>;
};

const defaultDependencies: AppDependencies = {
  loadConfig,
  createMediaTools: (tools) => createMediaTools(tools, { log: logger }),
};

export type SyncOptions = {
  configPath: string;
  /** Only collections with this name */
  only?: string;
  verbose?: boolean;
};

export type TrailerOptions = {
  root: string;
  concurrency: number;
  /** Only used for tool paths */
  configPath?: string;
};

/**
 * Fail before any work when a required binary cannot be run
 */
async function ensureTools(tools: ToolCheck): Promise<void> {
  logger.info('Checking external tools...');
  const missing = await tools.findMissingTools();
  const [first] = missing;
  if (first !== undefined) {
    throw new MissingToolError(
      `Required tool(s) not found: ${missing.join(', ')}. Install them or set their paths under "tools" in the config.`,
      first,
    );
  }
}

export async function runSync(options: SyncOptions, deps: AppDependencies = defaultDependencies): Promise<BatchSummary> {
  const startedAt = Date.now();

  logger.info(`Loading configuration from ${options.configPath}...`);
  const config = await deps.loadConfig(options.configPath);
  logger.setLevel(options.verbose ? LogLevel.DEBUG : parseLogLevel(config.globalConfig?.logLevel));
  logger.success('Configuration loaded');

  const resolver = new ConfigResolver(config.globalConfig);
  const selected = options.only
    ? config.collections.filter((collection) => collection.name === options.only)
    : config.collections;
  if (selected.length === 0) {
    throw new ConfigError(`No collection named "${options.only}" in ${options.configPath}`);
  }
  const resolved = selected.map((collection) => resolver.resolve(collection));

  const tools = deps.createMediaTools(ConfigResolver.resolveTools(config.tools));
  await ensureTools(tools);

  const concurrency = resolver.getConcurrency();
  logger.info(`Syncing ${resolved.length} collection(s), ${concurrency} at a time`);

  const summary = await runBatch(resolved, {
    tools,
    log: logger,
    concurrency,
    orchestrator: { sleep: deps.sleep },
  });

  for (const report of summary.reports) {
    const note = report.listingError ? ' (listing failed)' : '';
    logger.info(
      `${report.label}: ${report.fetched} fetched, ${report.skippedPermanent} skipped, ${report.failed} failed, ` +
        `${report.subtitles.recovered} subtitle(s) recovered${note}`,
    );
  }
  for (const crash of summary.crashed) {
    logger.error(`${crash.label}: aborted (${crash.error})`);
  }

  const { totals } = summary;
  logger.highlight(
    `Done in ${formatDuration(Date.now() - startedAt)}: ${totals.fetched} fetched, ` +
      `${totals.skippedPermanent} skipped, ${totals.failed} failed, ${totals.violations} non-compliant, ` +
      `${totals.subtitlesRecovered} subtitle(s) recovered`,
  );
  return summary;
}

export async function runTrailers(
  options: TrailerOptions,
  deps: AppDependencies = defaultDependencies,
): Promise<TrailerTally> {
  const toolsConfig = options.configPath ? (await deps.loadConfig(options.configPath)).tools : undefined;
  const tools = deps.createMediaTools(ConfigResolver.resolveTools(toolsConfig));
  await ensureTools(tools);

  const tally = await runTrailerBatch({
    root: options.root,
    concurrency: options.concurrency,
    tools,
    log: logger.child('trailers'),
  });

  logger.highlight(`Trailers: ${tally.fetched} fetched, ${tally.present} already present, ${tally.failed} failed`);
  return tally;
}

function reportFatal(error: unknown): never {
  if (error instanceof ConfigError) {
    logger.error(`Configuration error: ${error.message}`);
  } else {
    logger.error(`Fatal error: ${errorMessage(error)}`);
  }
  process.exit(1);
}

const syncCommand = command({
  name: 'sync',
  description: 'Mirror every configured playlist into its directory',
  args: {
    config: option({
      type: string,
      long: 'config',
      short: 'c',
      defaultValue: () => DEFAULT_CONFIG_PATH,
      description: `Path to configuration file (default: ${DEFAULT_CONFIG_PATH})`,
    }),
    only: option({
      type: optional(string),
      long: 'only',
      description: 'Sync only the collections with this name',
    }),
    verbose: flag({
      type: boolean,
      long: 'verbose',
      short: 'v',
      description: 'Log at debug level',
    }),
  },
  handler: async ({ config, only, verbose }) => {
    try {
      await runSync({ configPath: config, only, verbose });
    } catch (error) {
      reportFatal(error);
    }
  },
});

const trailersCommand = command({
  name: 'trailers',
  description: 'Fetch one trailer into every subfolder of a directory',
  args: {
    root: option({
      type: string,
      long: 'root',
      short: 'r',
      description: 'Directory whose subfolders get trailers',
    }),
    concurrency: option({
      type: number,
      long: 'concurrency',
      short: 'j',
      defaultValue: () => DEFAULT_TRAILER_CONCURRENCY,
      description: `Folders processed in parallel (default: ${DEFAULT_TRAILER_CONCURRENCY})`,
    }),
    config: option({
      type: optional(string),
      long: 'config',
      short: 'c',
      description: 'Configuration file to read tool paths from',
    }),
  },
  handler: async ({ root, concurrency, config }) => {
    try {
      await runTrailers({ root, concurrency, configPath: config });
    } catch (error) {
      reportFatal(error);
    }
  },
});

// Define CLI using cmd-ts
export const cli = subcommands({
  name: 'reelsync',
  description: 'Incrementally mirror playlists into local media folders',
  version: '0.1.0',
  cmds: {
    sync: syncCommand,
    trailers: trailersCommand,
  },
});
