import { existsSync } from 'node:fs';
import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { formatTimestamp } from '../utils/time-utils.js';
import { PathLock } from './path-lock.js';

const BOM = '\uFEFF';

/**
 * Where audit entries go. Implemented by {@link AuditLog}; tests may pass
 * an in-memory sink.
 */
export type AuditSink = {
  write(message: string): Promise<void>;
};

/**
 * Append-only, human-tailable log file: `<timestamp>\t<message>` per line,
 * UTF-8 with a byte-order mark written when the file is created.
 *
 * Each entry is written with a single append call so concurrent writers
 * never interleave partial lines.
 */
export class AuditLog implements AuditSink {
  constructor(
    private readonly logPath: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  get path(): string {
    return this.logPath;
  }

  async write(message: string): Promise<void> {
    // Keep one entry on one line
    const flat = message.replace(/\r?\n/g, ' | ').replace(/\t/g, ' ');
    const line = `${formatTimestamp(this.now())}\t${flat}\n`;

    // Creation is serialized so the BOM is written exactly once
    if (!existsSync(this.logPath)) {
      await PathLock.run(this.logPath, async () => {
        if (existsSync(this.logPath)) return;
        await mkdir(dirname(this.logPath), { recursive: true });
        await writeFile(this.logPath, BOM, { encoding: 'utf-8', flag: 'wx' }).catch((error: NodeJS.ErrnoException) => {
          if (error.code !== 'EEXIST') throw error;
        });
      });
    }

    await appendFile(this.logPath, line, 'utf-8');
  }
}
