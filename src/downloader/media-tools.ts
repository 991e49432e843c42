import type { ResolvedTools } from '../config/resolved-config.types.js';
import { FfmpegTagger } from '../media/ffmpeg.js';
import { FfprobeProber } from '../media/ffprobe.js';
import type { Logger } from '../utils/logger.js';
import { type CommandRunner, runCommand } from '../utils/process-runner.js';
import { YtdlpWrapper } from './lib/ytdlp-wrapper.js';
import type { MediaTools, ToolCheck } from './types.js';

export type MediaToolsOptions = {
  run?: CommandRunner;
  /** Receives progress and tool chatter at debug level */
  log?: Logger;
};

/**
 * Compose the yt-dlp, ffprobe and ffmpeg wrappers into the pipeline's tool set
 */
export function createMediaTools(tools: ResolvedTools, options: MediaToolsOptions = {}): MediaTools & ToolCheck {
  const run = options.run ?? runCommand;
  const log = options.log;

  const ytdlp = new YtdlpWrapper({
    binary: tools.ytDlp,
    run,
    onProgress: (progress) => log?.debug(progress),
    onLog: (message) => log?.debug(message),
  });
  const prober = new FfprobeProber(tools.ffprobe, run);
  const tagger = new FfmpegTagger(tools.ffmpeg, run);

  return {
    list: (locator) => ytdlp.list(locator),
    fetch: (request) => ytdlp.fetch(request),
    probe: (filePath, stream) => prober.probe(filePath, stream),
    tagMetadata: (request) => tagger.tag(request),
    fetchSubtitles: (request) => ytdlp.fetchSubtitles(request),
    fetchTrailer: (request) => ytdlp.fetchTrailer(request),

    async findMissingTools() {
      const checks: Array<[string, Promise<boolean>]> = [
        [tools.ytDlp, ytdlp.isInstalled()],
        [tools.ffprobe, prober.isInstalled()],
        [tools.ffmpeg, tagger.isInstalled()],
      ];
      const missing: string[] = [];
      for (const [name, installed] of checks) {
        if (!(await installed)) missing.push(name);
      }
      return missing;
    },
  };
}
