import type { ResolvedCollectionConfig } from '../config/resolved-config.types.js';
import { FetchOrchestrator } from '../downloader/fetch-orchestrator.js';
import type { MediaTools } from '../downloader/types.js';
import { errorMessage } from '../errors/custom-errors.js';
import { CompatibilityValidator } from '../media/compatibility-validator.js';
import { buildItemMetadata, MetadataTagger } from '../media/metadata-tagger.js';
import { ArchiveStore } from '../state/archive-store.js';
import { AuditLog, type AuditSink } from '../state/audit-log.js';
import { collectionPaths } from '../state/collection-paths.js';
import { MediaIndex } from '../state/media-index.js';
import { SubtitleFailureCache } from '../state/subtitle-failure-cache.js';
import { itemLocator, SubtitleRecoveryEngine, summarizeSubtitles } from '../subtitles/subtitle-recovery.js';
import type { RemoteItem } from '../types/collection.types.js';
import type { Logger } from '../utils/logger.js';
import { SyncPhase } from './sync-phase.js';
import { emptySyncReport, type SyncReport } from './sync-report.js';

export type PhaseListener = (phase: SyncPhase, item?: RemoteItem) => void;

export type SyncOrchestratorDeps = {
  config: ResolvedCollectionConfig;
  tools: MediaTools;
  log: Logger;
  onPhase?: PhaseListener;
  /** Forwarded to the fetch cascade */
  sleep?: (ms: number) => Promise<void>;
  /** Clock for audit log timestamps */
  now?: () => Date;
};

/**
 * Highest position already settled: the local maximum for the season, or a
 * remote position whose id is archived (fetched elsewhere, or permanently
 * skipped), whichever is higher.
 */
export function computeCursor(
  localMax: number,
  items: readonly RemoteItem[],
  isArchived: (id: string) => boolean,
): number {
  let cursor = localMax;
  for (const item of items) {
    if (item.position > cursor && isArchived(item.id)) {
      cursor = item.position;
    }
  }
  return cursor;
}

/**
 * Runs one collection through list, cursor, fetch and subtitle recovery.
 *
 * Per-item problems become outcomes in the report; only state-file failures
 * (archive, cache, index) reject.
 */
export class SyncOrchestrator {
  private phase: SyncPhase = SyncPhase.IDLE;

  constructor(private readonly deps: SyncOrchestratorDeps) {}

  get currentPhase(): SyncPhase {
    return this.phase;
  }

  async run(): Promise<SyncReport> {
    const { config, tools, log } = this.deps;
    const { collection } = config;
    const label = `${collection.displayName} ${collection.seasonTag}`;
    const report = emptySyncReport(label);
    const paths = collectionPaths(collection);

    const archive = new ArchiveStore(paths.archive);
    const cache = new SubtitleFailureCache(paths.subtitleFailures);
    const index = new MediaIndex(paths.mediaIndex, collection.localDirectory, collection.seasonTag, log);
    const audit = new AuditLog(paths.auditLog, this.deps.now);
    const violations = new AuditLog(paths.violationsLog, this.deps.now);

    await archive.load();
    await cache.load();
    const rebuilt = await index.rebuild();
    log.debug(
      `Index: ${rebuilt.kept} kept, ${rebuilt.discovered} discovered, ${rebuilt.dropped} dropped; ` +
        `${archive.size} archived`,
    );

    // Listing
    this.enter(SyncPhase.LISTING);
    const items = await this.listItems(audit, report);
    report.listed = items.length;

    // Cursor
    this.enter(SyncPhase.COMPUTING_CURSOR);
    report.cursor = computeCursor(index.maxPosition(), items, (id) => archive.contains(config.sourceKind, id));
    const queue = items.filter((item) => item.position > report.cursor).sort((a, b) => a.position - b.position);
    report.queued = queue.length;
    log.info(`${items.length} listed, cursor at ${report.cursor}, ${queue.length} queued`);

    // Fetching
    const fetcher = new FetchOrchestrator({ config, archive, tools, audit, log, sleep: this.deps.sleep });
    const validator = new CompatibilityValidator(config.compliance, tools, violations, log);
    const tagger = new MetadataTagger(tools, log);

    for (const item of queue) {
      this.enter(SyncPhase.FETCHING, item);

      if (archive.contains(config.sourceKind, item.id) || index.findById(item.id)) {
        log.debug(`#${item.position} ${item.id} is already known; skipping`);
        report.alreadyKnown++;
        continue;
      }

      const outcome = await fetcher.fetch(item);
      if (outcome.kind === 'skipped-permanent') {
        report.skippedPermanent++;
        continue;
      }
      if (outcome.kind === 'failed') {
        report.failed++;
        continue;
      }

      report.fetched++;
      await index.register(outcome.file);

      const compatibility = await validator.validate(outcome.file.path);
      if (!compatibility.compliant) report.violations++;

      if (config.tagMetadata) {
        const tagged = await tagger.tag(outcome.file.path, buildItemMetadata(item, outcome.info, collection));
        if (tagged.ok) {
          report.tagged++;
        } else {
          report.taggingFailed++;
          await audit.write(`TAG-FAILED ${item.id}: ${tagged.reason}`);
        }
      }
    }

    // Subtitles
    this.enter(SyncPhase.RECOVERING_SUBTITLES);
    if (config.subtitles.enabled) {
      const engine = new SubtitleRecoveryEngine({
        directory: collection.localDirectory,
        settings: config.subtitles,
        itemUrlTemplate: config.itemUrlTemplate,
        cookieFile: config.fetch.cookieFile,
        tools,
        cache,
        audit,
        log,
      });
      report.subtitles = summarizeSubtitles(await engine.sweep());
    }

    this.enter(SyncPhase.DONE);
    report.phase = this.phase;
    await audit.write(
      `RUN listed=${report.listed} cursor=${report.cursor} fetched=${report.fetched} ` +
        `skipped=${report.skippedPermanent} failed=${report.failed} subtitles=${report.subtitles.recovered}`,
    );
    return report;
  }

  /**
   * A failed listing is logged and treated as an empty collection
   */
  private async listItems(audit: AuditSink, report: SyncReport): Promise<RemoteItem[]> {
    const { config, tools, log } = this.deps;

    try {
      const entries = await tools.list(config.collection.remoteLocator);
      return entries.map((entry) => ({
        position: entry.position,
        id: entry.id,
        title: entry.title,
        locator: entry.locator ?? itemLocator(config.itemUrlTemplate, entry.id),
      }));
    } catch (error) {
      const message = errorMessage(error);
      report.listingError = message;
      log.error(`Listing failed: ${message}`);
      await audit.write(`LIST-FAILED ${config.collection.remoteLocator}: ${message}`);
      return [];
    }
  }

  private enter(phase: SyncPhase, item?: RemoteItem): void {
    this.phase = phase;
    this.deps.onPhase?.(phase, item);
  }
}
