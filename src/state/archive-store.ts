import { existsSync } from 'node:fs';
import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ArchiveError, errorMessage } from '../errors/custom-errors.js';
import { PathLock } from './path-lock.js';

/**
 * Append-only record of materialized item ids.
 *
 * One `<sourceKind> <id>` per line, the same layout the fetch tool keeps for
 * its own download archive, so both can share one file. Presence means
 * "must not fetch again".
 *
 * The file is read once on {@link load}; afterwards entries added by this
 * process are tracked in memory, and entries appended by the fetch tool are
 * picked up by calling {@link load} again.
 */
export class ArchiveStore {
  private entries = new Set<string>();
  private loaded = false;

  constructor(private readonly archivePath: string) {}

  get path(): string {
    return this.archivePath;
  }

  /**
   * (Re)read the archive file. A missing file is an empty archive.
   */
  async load(): Promise<void> {
    const entries = new Set<string>();

    if (existsSync(this.archivePath)) {
      let content: string;
      try {
        content = await readFile(this.archivePath, 'utf-8');
      } catch (error) {
        throw new ArchiveError(`Failed to read archive: ${errorMessage(error)}`, this.archivePath);
      }

      for (const line of content.split(/\r?\n/)) {
        const parts = line.trim().split(/\s+/);
        if (parts.length !== 2 || !parts[0] || !parts[1]) continue;
        entries.add(ArchiveStore.key(parts[0], parts[1]));
      }
    }

    this.entries = entries;
    this.loaded = true;
  }

  contains(sourceKind: string, id: string): boolean {
    this.assertLoaded();
    return this.entries.has(ArchiveStore.key(sourceKind, id));
  }

  /**
   * Record an item. Recording a present entry is a no-op.
   */
  async record(sourceKind: string, id: string): Promise<void> {
    this.assertLoaded();
    if (/\s/.test(sourceKind) || /\s/.test(id) || !sourceKind || !id) {
      throw new ArchiveError(`Invalid archive entry "${sourceKind} ${id}"`, this.archivePath);
    }

    await PathLock.run(this.archivePath, async () => {
      const key = ArchiveStore.key(sourceKind, id);
      if (this.entries.has(key)) return;

      try {
        await mkdir(dirname(this.archivePath), { recursive: true });
        await appendFile(this.archivePath, `${key}\n`, 'utf-8');
      } catch (error) {
        throw new ArchiveError(`Failed to append to archive: ${errorMessage(error)}`, this.archivePath);
      }
      this.entries.add(key);
    });
  }

  get size(): number {
    return this.entries.size;
  }

  private assertLoaded(): void {
    if (!this.loaded) {
      throw new ArchiveError('Archive used before load()', this.archivePath);
    }
  }

  private static key(sourceKind: string, id: string): string {
    return `${sourceKind} ${id}`;
  }
}
