import { ProbeError } from '../errors/custom-errors.js';
import type { StreamKind, StreamProbe } from '../downloader/types.js';
import { type CommandRunner, runCommand } from '../utils/process-runner.js';

const STREAM_SELECTOR: Record<StreamKind, string> = {
  video: 'v:0',
  audio: 'a:0',
};

const STREAM_ENTRIES: Record<StreamKind, string> = {
  video: 'stream=codec_name,height',
  audio: 'stream=codec_name',
};

export function probeArgs(filePath: string, stream: StreamKind): string[] {
  // ffprobe -v error -select_streams v:0 -show_entries stream=codec_name,height -of csv=p=0 input.mp4
  return [
    '-v',
    'error',
    '-select_streams',
    STREAM_SELECTOR[stream],
    '-show_entries',
    STREAM_ENTRIES[stream],
    '-of',
    'csv=p=0',
    filePath,
  ];
}

/**
 * Parse ffprobe CSV output for a single stream
 *
 * @returns null when ffprobe printed nothing (no such stream)
 */
export function parseProbeOutput(output: string, stream: StreamKind): StreamProbe | null {
  const line = output.split('\n').find((candidate) => candidate.trim() !== '');
  if (!line) return null;

  const [codec = '', height = ''] = line.trim().split(',');
  if (!codec) return null;

  if (stream === 'audio') return { codec };

  const parsedHeight = Number.parseInt(height, 10);
  return Number.isNaN(parsedHeight) ? { codec } : { codec, height: parsedHeight };
}

/**
 * Reads stream properties with ffprobe
 */
export class FfprobeProber {
  constructor(
    private readonly binary = 'ffprobe',
    private readonly run: CommandRunner = runCommand,
  ) {}

  async probe(filePath: string, stream: StreamKind): Promise<StreamProbe | null> {
    const result = await this.run(this.binary, probeArgs(filePath, stream));
    if (result.exitCode !== 0) {
      throw new ProbeError(`ffprobe exited with ${result.exitCode}: ${result.output}`, filePath);
    }
    return parseProbeOutput(result.output, stream);
  }

  async isInstalled(): Promise<boolean> {
    const result = await this.run(this.binary, ['-version']);
    return result.exitCode === 0;
  }
}
