import { existsSync } from 'node:fs';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { quietLogger } from '../testing/collection-fixture.js';
import { FakeMediaTools } from '../testing/fake-media-tools.js';
import type { CollectionRef, RemoteItem } from '../types/collection.types.js';
import { buildItemMetadata, MetadataTagger, metadataPairs, taggingTempPath } from './metadata-tagger.js';

const COLLECTION: CollectionRef = {
  remoteLocator: 'PL',
  displayName: 'My Show',
  seasonTag: 'S02',
  localDirectory: '/media',
  logDirectory: '/logs',
};

const ITEM: RemoteItem = { position: 4, id: 'aaaaaaaaaa1', title: 'Listing Title', locator: 'L' };

describe('buildItemMetadata', () => {
  it('should combine item info with the collection album', () => {
    expect(
      buildItemMetadata(
        ITEM,
        {
          title: 'Info Title',
          uploader: 'Studio',
          description: 'About this one',
          uploadDate: '20240307',
          tags: ['drama', 'season two'],
        },
        COLLECTION,
      ),
    ).toEqual({
      title: 'Info Title',
      artist: 'Studio',
      album: 'My Show S02',
      comment: 'About this one',
      date: '2024-03-07',
      genre: 'drama; season two',
    });
  });

  it('should fall back to the listing title without info', () => {
    expect(buildItemMetadata(ITEM, undefined, COLLECTION)).toEqual({ title: 'Listing Title', album: 'My Show S02' });
  });

  it('should pass a non-compact date through unchanged', () => {
    const metadata = buildItemMetadata(ITEM, { uploadDate: '2024-03', tags: [] }, COLLECTION);
    expect(metadata.date).toBe('2024-03');
    expect(metadata.genre).toBeUndefined();
  });
});

describe('metadataPairs', () => {
  it('should emit only present fields in a fixed order', () => {
    expect(metadataPairs({ title: 'T', album: 'A', date: '2024-01-01' })).toEqual([
      ['title', 'T'],
      ['album', 'A'],
      ['date', '2024-01-01'],
    ]);
  });
});

describe('taggingTempPath', () => {
  it('should sit beside the original', () => {
    expect(taggingTempPath('/m/Show [aaaaaaaaaa1].mp4')).toBe('/m/Show [aaaaaaaaaa1].tagging.mp4');
  });
});

describe('MetadataTagger', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tagger-'));
    file = join(dir, 'My Show - S02E04 - Listing Title [aaaaaaaaaa1].mp4');
    await writeFile(file, 'original bytes');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should replace the file with the rewritten copy', async () => {
    const tools = new FakeMediaTools();
    const tagger = new MetadataTagger(tools, quietLogger());

    await expect(tagger.tag(file, { title: 'T', album: 'A' })).resolves.toEqual({ ok: true });

    expect(await readFile(file, 'utf-8')).toBe('original bytes\ntitle=T\nalbum=A');
    expect(await readdir(dir)).toEqual(['My Show - S02E04 - Listing Title [aaaaaaaaaa1].mp4']);
    expect(tools.calls.tag[0]?.output).toBe(join(dir, 'My Show - S02E04 - Listing Title [aaaaaaaaaa1].tagging.mp4'));
  });

  it('should leave the original untouched and remove the temp file when the tool fails', async () => {
    const tools = new FakeMediaTools();
    tools.tagFails = true;
    const tagger = new MetadataTagger(tools, quietLogger());

    const result = await tagger.tag(file, { title: 'T', album: 'A' });

    expect(result).toEqual({ ok: false, reason: 'Metadata tool exited with 1: Conversion failed!' });
    expect(await readFile(file, 'utf-8')).toBe('original bytes');
    expect(existsSync(taggingTempPath(file))).toBe(false);
  });

  it('should fail when the tool exits cleanly without an output file', async () => {
    const tools = new FakeMediaTools();
    tools.tagMetadata = async () => ({ exitCode: 0, output: '' });

    const result = await new MetadataTagger(tools, quietLogger()).tag(file, { title: 'T', album: 'A' });

    expect(result).toEqual({ ok: false, reason: 'Metadata tool produced no output file' });
    expect(await readFile(file, 'utf-8')).toBe('original bytes');
  });

  it('should clear a temp file left by an earlier run before rewriting', async () => {
    await writeFile(taggingTempPath(file), 'stale copy');
    const tools = new FakeMediaTools();
    tools.tagMetadata = async () => ({ exitCode: 0, output: '' });

    const result = await new MetadataTagger(tools, quietLogger()).tag(file, { title: 'T', album: 'A' });

    expect(result).toEqual({ ok: false, reason: 'Metadata tool produced no output file' });
    expect(await readFile(file, 'utf-8')).toBe('original bytes');
    expect(await readdir(dir)).toEqual(['My Show - S02E04 - Listing Title [aaaaaaaaaa1].mp4']);
  });

  it('should reject containers other than mp4 without calling the tool', async () => {
    const mkv = join(dir, 'clip [aaaaaaaaaa1].mkv');
    await writeFile(mkv, 'mkv bytes');
    const tools = new FakeMediaTools();

    const result = await new MetadataTagger(tools, quietLogger()).tag(mkv, { title: 'T', album: 'A' });

    expect(result).toEqual({ ok: false, reason: 'Only .mp4 files can be tagged' });
    expect(tools.calls.tag).toEqual([]);
    expect(await readFile(mkv, 'utf-8')).toBe('mkv bytes');
  });

  it('should fail for a missing file', async () => {
    const result = await new MetadataTagger(new FakeMediaTools(), quietLogger()).tag(join(dir, 'gone.mp4'), {
      title: 'T',
      album: 'A',
    });
    expect(result).toEqual({ ok: false, reason: 'File does not exist' });
  });
});
