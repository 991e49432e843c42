import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readItemInfo } from './item-info.js';

describe('readItemInfo', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'item-info-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should map the fields used for tagging', async () => {
    const path = join(dir, 'a.info.json');
    await writeFile(
      path,
      JSON.stringify({
        id: 'abcDEF12345',
        title: 'Pilot',
        uploader: 'Studio',
        description: 'First episode',
        upload_date: '20240307',
        tags: ['drama', 'pilot'],
        formats: [],
      }),
    );

    await expect(readItemInfo(path)).resolves.toEqual({
      title: 'Pilot',
      uploader: 'Studio',
      description: 'First episode',
      uploadDate: '20240307',
      tags: ['drama', 'pilot'],
    });
  });

  it('should fall back to the channel and default tags to empty', async () => {
    const path = join(dir, 'b.info.json');
    await writeFile(path, JSON.stringify({ channel: 'Channel', tags: null }));

    await expect(readItemInfo(path)).resolves.toEqual({
      title: undefined,
      uploader: 'Channel',
      description: undefined,
      uploadDate: undefined,
      tags: [],
    });
  });

  it('should return null for a missing file or bad JSON', async () => {
    const path = join(dir, 'c.info.json');
    await expect(readItemInfo(path)).resolves.toBeNull();

    await writeFile(path, '{not json');
    await expect(readItemInfo(path)).resolves.toBeNull();
  });

  it('should return null when a field has the wrong type', async () => {
    const path = join(dir, 'd.info.json');
    await writeFile(path, JSON.stringify({ title: 42 }));
    await expect(readItemInfo(path)).resolves.toBeNull();
  });
});
