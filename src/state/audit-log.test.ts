import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AuditLog } from './audit-log.js';

describe('AuditLog', () => {
  let dir: string;
  const fixedNow = () => new Date(2025, 5, 1, 9, 30, 0);

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'reelsync-audit-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write a BOM once and tab-delimited lines', async () => {
    const path = join(dir, 'logs', 'show.log');
    const log = new AuditLog(path, fixedNow);

    await log.write('sync started');
    await log.write('fetched E02');

    expect(await readFile(path, 'utf-8')).toBe(
      '\uFEFF2025-06-01 09:30:00\tsync started\n2025-06-01 09:30:00\tfetched E02\n',
    );
  });

  it('should flatten multi-line messages and tabs', async () => {
    const path = join(dir, 'show.log');
    const log = new AuditLog(path, fixedNow);

    await log.write('fetch failed:\nline one\r\nline\ttwo');

    expect(await readFile(path, 'utf-8')).toBe('\uFEFF2025-06-01 09:30:00\tfetch failed: | line one | line two\n');
  });

  it('should keep whole lines under concurrent writers', async () => {
    const path = join(dir, 'shared.log');
    const writers = [new AuditLog(path, fixedNow), new AuditLog(path, fixedNow)];

    await Promise.all(
      Array.from({ length: 20 }, (_, i) => writers[i % 2]?.write(`entry ${i.toString().padStart(2, '0')}`)),
    );

    const content = await readFile(path, 'utf-8');
    expect(content.startsWith('\uFEFF')).toBe(true);
    expect(content.indexOf('\uFEFF', 1)).toBe(-1);
    const lines = content.slice(1).trimEnd().split('\n');
    expect(lines).toHaveLength(20);
    expect(lines.every((line) => /^2025-06-01 09:30:00\tentry \d{2}$/.test(line))).toBe(true);
  });
});
