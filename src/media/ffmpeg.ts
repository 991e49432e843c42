import type { TagRequest } from '../downloader/types.js';
import { type CommandResult, type CommandRunner, runCommand } from '../utils/process-runner.js';

/**
 * Stream-copy remux that rewrites container metadata
 */
export function tagArgs(request: TagRequest): string[] {
  const args = ['-hide_banner', '-loglevel', 'error', '-y', '-i', request.input, '-map', '0', '-c', 'copy'];
  for (const [key, value] of request.metadata) {
    args.push('-metadata', `${key}=${value}`);
  }
  args.push(request.output);
  return args;
}

export class FfmpegTagger {
  constructor(
    private readonly binary = 'ffmpeg',
    private readonly run: CommandRunner = runCommand,
  ) {}

  tag(request: TagRequest): Promise<CommandResult> {
    return this.run(this.binary, tagArgs(request));
  }

  async isInstalled(): Promise<boolean> {
    const result = await this.run(this.binary, ['-version']);
    return result.exitCode === 0;
  }
}
