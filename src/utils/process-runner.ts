import { execa } from 'execa';
import { errorMessage } from '../errors/custom-errors.js';

/**
 * Exit status plus combined stdout/stderr of an external command
 */
export type CommandResult = {
  exitCode: number;
  output: string;
};

export type LineHandler = (line: string) => void;

export type CommandRunner = (file: string, args: readonly string[], onLine?: LineHandler) => Promise<CommandResult>;

/**
 * Run an external command to completion.
 *
 * Never rejects on a non-zero exit: the exit code and the interleaved
 * stdout/stderr lines are returned for the caller to classify. A command
 * that cannot be spawned reports exit code 127.
 */
export const runCommand: CommandRunner = async (file, args, onLine) => {
  const lines: string[] = [];

  try {
    const subprocess = execa(file, args, { all: true, reject: false, stdin: 'ignore' });

    for await (const line of subprocess.iterable({ from: 'all' })) {
      const text = line.trim();
      if (!text) continue;
      lines.push(text);
      onLine?.(text);
    }

    const result = await subprocess;
    if (result.exitCode === undefined) {
      lines.push(`${file} did not run to completion`);
      return { exitCode: result.failed ? 127 : 1, output: lines.join('\n') };
    }
    return { exitCode: result.exitCode, output: lines.join('\n') };
  } catch (error) {
    lines.push(errorMessage(error));
    return { exitCode: 127, output: lines.join('\n') };
  }
};
