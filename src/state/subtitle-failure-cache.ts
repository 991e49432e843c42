import { existsSync } from 'node:fs';
import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { PathLock } from './path-lock.js';

/**
 * Base names whose subtitle recovery was exhaustively attempted and failed.
 *
 * One base name per line, append-only. There is no removal
 * method: clearing an entry means editing the file by hand.
 */
export class SubtitleFailureCache {
  private names = new Set<string>();

  constructor(private readonly cachePath: string) {}

  get path(): string {
    return this.cachePath;
  }

  async load(): Promise<void> {
    if (!existsSync(this.cachePath)) {
      this.names = new Set();
      return;
    }
    const content = await readFile(this.cachePath, 'utf-8');
    this.names = new Set(
      content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0),
    );
  }

  has(baseName: string): boolean {
    return this.names.has(baseName);
  }

  async add(baseName: string): Promise<void> {
    if (/[\r\n]/.test(baseName)) {
      throw new Error(`Base name contains a line break: ${JSON.stringify(baseName)}`);
    }

    await PathLock.run(this.cachePath, async () => {
      if (this.names.has(baseName)) return;
      await mkdir(dirname(this.cachePath), { recursive: true });
      await appendFile(this.cachePath, `${baseName}\n`, 'utf-8');
      this.names.add(baseName);
    });
  }

  get size(): number {
    return this.names.size;
  }
}
