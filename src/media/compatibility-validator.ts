import { basename } from 'node:path';
import type { CompliancePolicy } from '../config/resolved-config.types.js';
import type { MediaTools, StreamKind, StreamProbe } from '../downloader/types.js';
import { errorMessage } from '../errors/custom-errors.js';
import type { AuditSink } from '../state/audit-log.js';
import type { CompatibilityReport } from '../types/outcome.types.js';
import type { Logger } from '../utils/logger.js';

const UNKNOWN_CODEC = 'unknown';

/**
 * Classify a file against the compliance policy by probing its first video
 * and first audio stream. Read-only: the file is never touched.
 */
export class CompatibilityValidator {
  constructor(
    private readonly policy: CompliancePolicy,
    private readonly tools: Pick<MediaTools, 'probe'>,
    private readonly violations: AuditSink,
    private readonly log: Logger,
  ) {}

  /**
   * Never throws for probe problems: an unprobeable stream counts as
   * `unknown` and makes the file non-compliant.
   */
  async validate(filePath: string): Promise<CompatibilityReport> {
    const video = await this.probeSafe(filePath, 'video');
    const audio = await this.probeSafe(filePath, 'audio');

    const report = classify(
      {
        videoCodec: video?.codec ?? UNKNOWN_CODEC,
        videoHeight: video?.height ?? 0,
        audioCodec: audio?.codec ?? UNKNOWN_CODEC,
      },
      this.policy,
    );

    if (report.compliant) {
      this.log.debug(`${basename(filePath)}: ${describe(report)}`);
    } else {
      this.log.warning(`Not compliant: ${basename(filePath)} (${report.violations.join(', ')})`);
      await this.violations.write(`${filePath} | ${describe(report)} | ${report.violations.join('; ')}`);
    }

    return report;
  }

  private async probeSafe(filePath: string, stream: StreamKind): Promise<StreamProbe | null> {
    try {
      return await this.tools.probe(filePath, stream);
    } catch (error) {
      this.log.warning(`Probe of ${stream} stream failed for ${basename(filePath)}: ${errorMessage(error)}`);
      return null;
    }
  }
}

/**
 * Pure classification of probed stream properties
 */
export function classify(
  streams: Pick<CompatibilityReport, 'videoCodec' | 'videoHeight' | 'audioCodec'>,
  policy: CompliancePolicy,
): CompatibilityReport {
  const violations: string[] = [];

  if (streams.videoCodec.toLowerCase() !== policy.videoCodec.toLowerCase()) {
    violations.push(`video codec ${streams.videoCodec} is not ${policy.videoCodec}`);
  }
  if (streams.videoHeight <= 0) {
    violations.push('video height unknown');
  } else if (streams.videoHeight > policy.maxHeight) {
    violations.push(`height ${streams.videoHeight} exceeds ${policy.maxHeight}`);
  }
  if (streams.audioCodec.toLowerCase() !== policy.audioCodec.toLowerCase()) {
    violations.push(`audio codec ${streams.audioCodec} is not ${policy.audioCodec}`);
  }

  return { ...streams, compliant: violations.length === 0, violations };
}

function describe(report: CompatibilityReport): string {
  return `${report.videoCodec} ${report.videoHeight}p / ${report.audioCodec}`;
}
