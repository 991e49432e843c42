import { existsSync } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ResolvedSubtitleSettings } from '../config/resolved-config.types.js';
import type { MediaTools } from '../downloader/types.js';
import { listMediaFiles } from '../media/media-files.js';
import type { AuditSink } from '../state/audit-log.js';
import type { SubtitleFailureCache } from '../state/subtitle-failure-cache.js';
import type { SubtitleOutcome } from '../types/outcome.types.js';
import { extractItemId, stripExtension } from '../utils/filename-sanitizer.js';
import type { Logger } from '../utils/logger.js';

export type SubtitleRecoveryDeps = {
  directory: string;
  settings: ResolvedSubtitleSettings;
  /** Locator template with an `{id}` placeholder */
  itemUrlTemplate: string;
  cookieFile?: string;
  tools: Pick<MediaTools, 'fetchSubtitles'>;
  cache: SubtitleFailureCache;
  audit: AuditSink;
  log: Logger;
};

export type SubtitleSweepSummary = {
  recovered: number;
  failed: number;
  skipped: number;
};

export function itemLocator(template: string, id: string): string {
  return template.replaceAll('{id}', id);
}

/**
 * Sweeps every media file in a collection directory and fetches a subtitle
 * track for those that have none.
 *
 * Base names for which every language failed go into the failure cache and
 * are never tried again; malformed names are skipped without a cache entry.
 */
export class SubtitleRecoveryEngine {
  constructor(private readonly deps: SubtitleRecoveryDeps) {}

  async sweep(): Promise<SubtitleOutcome[]> {
    const { directory, log } = this.deps;
    const mediaFiles = await listMediaFiles(directory);
    const subtitled = await this.subtitledBaseNames();
    const seen = new Set<string>();
    const outcomes: SubtitleOutcome[] = [];

    for (const fileName of mediaFiles) {
      const baseName = stripExtension(fileName);
      // Same base name in two containers shares one subtitle
      if (seen.has(baseName)) continue;
      seen.add(baseName);

      const outcome = await this.recover(baseName, subtitled);
      if (outcome.kind === 'recovered') subtitled.add(baseName);
      outcomes.push(outcome);
    }

    const summary = summarizeSubtitles(outcomes);
    if (summary.recovered > 0 || summary.failed > 0) {
      log.info(`Subtitles: ${summary.recovered} recovered, ${summary.failed} failed, ${summary.skipped} skipped`);
    } else {
      log.debug(`Subtitles: nothing to recover (${summary.skipped} skipped)`);
    }
    return outcomes;
  }

  private async recover(baseName: string, subtitled: ReadonlySet<string>): Promise<SubtitleOutcome> {
    const { directory, settings, itemUrlTemplate, cookieFile, tools, cache, audit, log } = this.deps;

    if (cache.has(baseName)) {
      return { kind: 'skipped', baseName, reason: 'cached' };
    }
    if (subtitled.has(baseName)) {
      return { kind: 'skipped', baseName, reason: 'present' };
    }

    const id = extractItemId(baseName);
    if (!id) {
      log.warning(`Cannot recover subtitles for "${baseName}": no item id in the name`);
      return { kind: 'skipped', baseName, reason: 'malformed-name' };
    }

    const outputBase = join(directory, baseName);
    const locator = itemLocator(itemUrlTemplate, id);
    const languagesTried: string[] = [];

    for (const language of settings.languages) {
      languagesTried.push(language);
      log.debug(`Trying ${language} subtitles for ${id}`);
      await tools.fetchSubtitles({ locator, language, outputBase, cookieFile });

      const path = `${outputBase}.${language}.srt`;
      if (existsSync(path)) {
        log.success(`Recovered ${language} subtitles for ${baseName}`);
        await audit.write(`SUBTITLE ${id} ${language}: ${path}`);
        return { kind: 'recovered', baseName, language, path };
      }
    }

    await cache.add(baseName);
    log.warning(`No subtitles in ${languagesTried.join(', ')} for ${baseName}`);
    await audit.write(`SUBTITLE-FAILED ${id}: tried ${languagesTried.join(', ')}`);
    return { kind: 'failed', baseName, languagesTried };
  }

  /**
   * Base names that already have at least one `<base>.<anything>.srt`
   */
  private async subtitledBaseNames(): Promise<Set<string>> {
    const names = new Set<string>();
    if (!existsSync(this.deps.directory)) return names;

    for (const entry of await readdir(this.deps.directory)) {
      if (!entry.toLowerCase().endsWith('.srt')) continue;
      const withoutSrt = entry.slice(0, -'.srt'.length);
      const dot = withoutSrt.lastIndexOf('.');
      if (dot > 0) names.add(withoutSrt.slice(0, dot));
    }
    return names;
  }
}

export function summarizeSubtitles(outcomes: readonly SubtitleOutcome[]): SubtitleSweepSummary {
  const summary: SubtitleSweepSummary = { recovered: 0, failed: 0, skipped: 0 };
  for (const outcome of outcomes) {
    summary[outcome.kind]++;
  }
  return summary;
}
