import { existsSync } from 'node:fs';
import { mkdir, readdir, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import { CANONICAL_CONTAINER } from '../config/config-defaults.js';
import type { ResolvedCollectionConfig } from '../config/resolved-config.types.js';
import { errorMessage } from '../errors/custom-errors.js';
import type { ArchiveStore } from '../state/archive-store.js';
import type { AuditSink } from '../state/audit-log.js';
import type { ItemInfo, RemoteItem } from '../types/collection.types.js';
import type { FetchOutcome } from '../types/outcome.types.js';
import { buildMediaBaseName } from '../utils/filename-sanitizer.js';
import type { Logger } from '../utils/logger.js';
import { sleep as defaultSleep } from '../utils/time-utils.js';
import { readItemInfo } from './item-info.js';
import type { MediaTools } from './types.js';

export type FetchOrchestratorDeps = {
  config: ResolvedCollectionConfig;
  archive: ArchiveStore;
  tools: MediaTools;
  audit: AuditSink;
  log: Logger;
  /** Replaced in tests to skip the retry delay */
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Runs the quality cascade for one item at a time.
 *
 * Profiles are tried in configured order. A marker in the tool output stops
 * the cascade for good and archives the item; a clean exit with the
 * destination present stops it with success; anything else moves on to the
 * next profile after the fixed retry delay.
 */
export class FetchOrchestrator {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly deps: FetchOrchestratorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async fetch(item: RemoteItem): Promise<FetchOutcome> {
    const { config, archive, tools, audit, log } = this.deps;
    const { collection, fetch: settings } = config;

    const baseName = buildMediaBaseName({
      showName: collection.displayName,
      seasonTag: collection.seasonTag,
      position: item.position,
      title: item.title,
      id: item.id,
    });
    const outputBase = join(collection.localDirectory, baseName);
    const destination = `${outputBase}.${CANONICAL_CONTAINER}`;

    await mkdir(collection.localDirectory, { recursive: true });

    const profiles = settings.qualityProfiles;
    let attempts = 0;
    let lastError = 'no quality profiles configured';

    for (const [index, profile] of profiles.entries()) {
      attempts++;
      log.info(`Fetching #${item.position} "${item.title}" at ${profile.name}`);

      const result = await tools.fetch({
        locator: item.locator,
        format: profile.format,
        outputBase,
        archiveFile: archive.path,
        cookieFile: settings.cookieFile,
        socketTimeout: settings.socketTimeout,
        writeInfoJson: true,
      });

      const marker = settings.incompatibilityMarkers.find((candidate) => result.output.includes(candidate));
      if (marker) {
        await archive.record(config.sourceKind, item.id);
        await this.removeLeftovers(baseName);
        log.warning(`#${item.position} ${item.id} is permanently unfetchable: ${marker}`);
        await audit.write(`SKIPPED ${item.id} at ${profile.name}: ${marker}`);
        return { kind: 'skipped-permanent', profile: profile.name, reason: marker };
      }

      if (result.exitCode === 0 && existsSync(destination)) {
        // The tool appends to the shared archive itself; reload before recording
        await archive.load();
        await archive.record(config.sourceKind, item.id);

        const info = await this.takeItemInfo(outputBase);
        log.success(`Fetched #${item.position} at ${profile.name}: ${baseName}`);
        await audit.write(`FETCHED ${item.id} at ${profile.name}: ${destination}`);
        return {
          kind: 'success',
          file: { path: destination, position: item.position, id: item.id },
          profile: profile.name,
          info: info ?? undefined,
        };
      }

      lastError =
        result.exitCode === 0
          ? `exited cleanly but ${destination} is missing`
          : lastLine(result.output, result.exitCode);
      log.warning(`${profile.name} failed for #${item.position}: ${lastError}`);

      if (index < profiles.length - 1) {
        log.info(`Retrying with the next profile in ${settings.retryDelay}s...`);
        await this.sleep(settings.retryDelay * 1000);
      }
    }

    await this.removeLeftovers(baseName);
    log.error(`All ${attempts} profile(s) failed for #${item.position} ${item.id}`);
    await audit.write(`FAILED ${item.id} after ${attempts} attempt(s): ${lastError}`);
    return { kind: 'failed', attempts, lastError };
  }

  private async takeItemInfo(outputBase: string): Promise<ItemInfo | null> {
    const infoJsonPath = `${outputBase}.info.json`;
    if (!existsSync(infoJsonPath)) return null;

    const info = await readItemInfo(infoJsonPath);
    await unlink(infoJsonPath).catch((error: unknown) => {
      this.deps.log.warning(`Failed to remove ${infoJsonPath}: ${errorMessage(error)}`);
    });
    return info;
  }

  /**
   * Remove every `<baseName>.*` file a failed cascade left behind
   */
  private async removeLeftovers(baseName: string): Promise<void> {
    const directory = this.deps.config.collection.localDirectory;
    const entries = await readdir(directory);
    for (const entry of entries) {
      if (!entry.startsWith(`${baseName}.`)) continue;
      const path = join(directory, entry);
      try {
        await unlink(path);
        this.deps.log.debug(`Removed leftover ${entry}`);
      } catch (error) {
        this.deps.log.warning(`Failed to remove leftover ${entry}: ${errorMessage(error)}`);
      }
    }
  }
}

function lastLine(output: string, exitCode: number): string {
  const lines = output.split('\n').filter((line) => line.trim() !== '');
  return lines[lines.length - 1] ?? `exit code ${exitCode}`;
}
