import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isMediaFileName, listMediaFiles } from './media-files.js';

describe('isMediaFileName', () => {
  it('should accept known containers in any case', () => {
    expect(isMediaFileName('Show - S01E01 - One [aaaaaaaaaa1].mp4')).toBe(true);
    expect(isMediaFileName('clip.MKV')).toBe(true);
    expect(isMediaFileName('clip.webm')).toBe(true);
  });

  it('should reject other files', () => {
    expect(isMediaFileName('clip.en.srt')).toBe(false);
    expect(isMediaFileName('clip.mp4.part')).toBe(false);
    expect(isMediaFileName('clip.info.json')).toBe(false);
  });

  it('should reject tagger temp files and unmerged fragments', () => {
    expect(isMediaFileName('clip.tagging.mp4')).toBe(false);
    expect(isMediaFileName('clip.f137.mp4')).toBe(false);
    expect(isMediaFileName('clip.f251.webm')).toBe(false);
  });
});

describe('listMediaFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'media-files-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should list media file names sorted', async () => {
    await writeFile(join(dir, 'b.mp4'), '');
    await writeFile(join(dir, 'a.mkv'), '');
    await writeFile(join(dir, 'a.en.srt'), '');
    await mkdir(join(dir, 'nested.mp4'));

    expect(await listMediaFiles(dir)).toEqual(['a.mkv', 'b.mp4']);
  });

  it('should return an empty list for a missing directory', async () => {
    expect(await listMediaFiles(join(dir, 'missing'))).toEqual([]);
  });
});
