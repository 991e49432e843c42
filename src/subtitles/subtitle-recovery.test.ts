import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SubtitleFailureCache } from '../state/subtitle-failure-cache.js';
import { MemoryAudit, quietLogger } from '../testing/collection-fixture.js';
import { FakeMediaTools } from '../testing/fake-media-tools.js';
import { itemLocator, SubtitleRecoveryEngine, summarizeSubtitles } from './subtitle-recovery.js';

const ONE = 'My Show - S01E01 - One [aaaaaaaaaa1]';
const TWO = 'My Show - S01E02 - Two [bbbbbbbbbb2]';
const THREE = 'My Show - S01E03 - Three [cccccccccc3]';
const FOUR = 'My Show - S01E04 - Four [dddddddddd4]';
const CLIP = 'random clip';

describe('SubtitleRecoveryEngine', () => {
  let dir: string;
  let cache: SubtitleFailureCache;
  let tools: FakeMediaTools;
  let audit: MemoryAudit;

  const engine = (directory = dir) =>
    new SubtitleRecoveryEngine({
      directory,
      settings: { enabled: true, languages: ['en-US', 'en'] },
      itemUrlTemplate: 'https://www.youtube.com/watch?v={id}',
      tools,
      cache,
      audit,
      log: quietLogger(),
    });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'subs-'));
    for (const base of [ONE, TWO, THREE, FOUR, CLIP]) {
      await writeFile(join(dir, `${base}.mp4`), 'media');
    }
    await writeFile(join(dir, `${TWO}.en-US.srt`), 'existing');

    cache = new SubtitleFailureCache(join(dir, 'failures.txt'));
    await cache.load();
    await cache.add(FOUR);

    tools = new FakeMediaTools([
      { id: 'aaaaaaaaaa1', title: 'One', subtitles: ['en'] },
      { id: 'bbbbbbbbbb2', title: 'Two', subtitles: ['en-US'] },
      { id: 'cccccccccc3', title: 'Three' },
      { id: 'dddddddddd4', title: 'Four', subtitles: ['en'] },
    ]);
    audit = new MemoryAudit();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should classify every media file in one sweep', async () => {
    const outcomes = await engine().sweep();

    expect(outcomes).toEqual([
      { kind: 'recovered', baseName: ONE, language: 'en', path: join(dir, `${ONE}.en.srt`) },
      { kind: 'skipped', baseName: TWO, reason: 'present' },
      { kind: 'failed', baseName: THREE, languagesTried: ['en-US', 'en'] },
      { kind: 'skipped', baseName: FOUR, reason: 'cached' },
      { kind: 'skipped', baseName: CLIP, reason: 'malformed-name' },
    ]);
  });

  it('should try languages in preference order and stop at the first hit', async () => {
    await engine().sweep();

    const forOne = tools.calls.subtitles.filter((call) => call.outputBase === join(dir, ONE));
    expect(forOne.map((call) => call.language)).toEqual(['en-US', 'en']);
    expect(forOne[0]?.locator).toBe('https://www.youtube.com/watch?v=aaaaaaaaaa1');
  });

  it('should cache exhausted base names but not malformed ones', async () => {
    await engine().sweep();

    expect(cache.has(THREE)).toBe(true);
    expect(cache.has(CLIP)).toBe(false);
    expect(await readFile(join(dir, 'failures.txt'), 'utf-8')).toBe(`${FOUR}\n${THREE}\n`);
  });

  it('should never call the tool again for a cached base name', async () => {
    await engine().sweep();
    tools.calls.subtitles.length = 0;

    const second = await engine().sweep();

    expect(tools.calls.subtitles).toEqual([]);
    expect(summarizeSubtitles(second)).toEqual({ recovered: 0, failed: 0, skipped: 5 });
  });

  it('should skip a base name whose subtitle appeared under another container', async () => {
    await writeFile(join(dir, `${ONE}.mkv`), 'media');

    const outcomes = await engine().sweep();

    expect(outcomes.filter((outcome) => outcome.baseName === ONE)).toHaveLength(1);
    expect(tools.calls.subtitles.filter((call) => call.outputBase === join(dir, ONE))).toHaveLength(2);
  });

  it('should write recoveries and failures to the audit log', async () => {
    await engine().sweep();

    expect(audit.entries).toEqual([
      `SUBTITLE aaaaaaaaaa1 en: ${join(dir, `${ONE}.en.srt`)}`,
      'SUBTITLE-FAILED cccccccccc3: tried en-US, en',
    ]);
  });

  it('should return nothing for a missing directory', async () => {
    await expect(engine(join(dir, 'missing')).sweep()).resolves.toEqual([]);
  });
});

describe('itemLocator', () => {
  it('should substitute the id', () => {
    expect(itemLocator('https://example.test/v/{id}?x={id}', 'abc')).toBe('https://example.test/v/abc?x=abc');
  });
});
