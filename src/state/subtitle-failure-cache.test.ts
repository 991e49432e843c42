import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SubtitleFailureCache } from './subtitle-failure-cache.js';

describe('SubtitleFailureCache', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'reelsync-subcache-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should persist names across instances', async () => {
    const path = join(dir, 'failures.txt');
    const cache = new SubtitleFailureCache(path);
    await cache.load();

    await cache.add('Show - S01E01 - Pilot [abcDEF12345]');
    await cache.add('Show - S01E01 - Pilot [abcDEF12345]');

    expect(await readFile(path, 'utf-8')).toBe('Show - S01E01 - Pilot [abcDEF12345]\n');

    const reloaded = new SubtitleFailureCache(path);
    await reloaded.load();
    expect(reloaded.has('Show - S01E01 - Pilot [abcDEF12345]')).toBe(true);
    expect(reloaded.has('Show - S01E02 - Next [abcDEF12346]')).toBe(false);
    expect(reloaded.size).toBe(1);
  });

  it('should reject names with line breaks', async () => {
    const cache = new SubtitleFailureCache(join(dir, 'failures.txt'));
    await cache.load();
    await expect(cache.add('a\nb')).rejects.toThrow('line break');
  });
});
