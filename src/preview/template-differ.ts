/**
 * Template differ
 *
 * Produces a line-oriented diff of the deployed template against the local
 * one, either with the built-in unified differ or with an external tool.
 */

import { writeFile } from 'fs/promises';
import { extname, join } from 'path';
import { structuredPatch } from 'diff';
import { execa } from 'execa';
import tmp from 'tmp-promise';
import type { TemplateDiff, TemplateDiffStatus } from '../types.js';
import { DiffToolError, PreviewInterruptedError } from '../lib/errors.js';
import type { Logger } from '../monitoring/structured-logger.js';

export interface TemplateDiffInput {
  remote: string;
  local: string;
  /** Path of the local template; its extension names the temporary files */
  localPath: string;
  signal?: AbortSignal;
}

export interface TemplateDiffer {
  diff(input: TemplateDiffInput): Promise<TemplateDiff>;
}

const REMOTE_LABEL = 'remote';
const LOCAL_LABEL = 'local';

/**
 * Unified diff with three lines of context, computed in process
 */
export class BuiltinTemplateDiffer implements TemplateDiffer {
  async diff(input: TemplateDiffInput): Promise<TemplateDiff> {
    const patch = structuredPatch(REMOTE_LABEL, LOCAL_LABEL, input.remote, input.local, undefined, undefined, {
      context: 3,
    });

    if (patch.hunks.length === 0) {
      return { text: '', status: 'identical' };
    }

    const lines = [`--- ${REMOTE_LABEL}`, `+++ ${LOCAL_LABEL}`];
    for (const hunk of patch.hunks) {
      const oldStart = hunk.oldLines === 0 ? hunk.oldStart - 1 : hunk.oldStart;
      const newStart = hunk.newLines === 0 ? hunk.newStart - 1 : hunk.newStart;
      lines.push(`@@ -${oldStart},${hunk.oldLines} +${newStart},${hunk.newLines} @@`, ...hunk.lines);
    }

    return { text: lines.join('\n') + '\n', status: 'different' };
  }
}

function classifyExitCode(exitCode: number, output: string): TemplateDiffStatus {
  if (exitCode === 0) {
    // Some tools exit 0 even when they print differences
    return output.trim().length > 0 ? 'different' : 'identical';
  }
  return exitCode === 1 ? 'different' : 'tool-error';
}

function readStringField(error: object, field: 'stdout' | 'stderr' | 'shortMessage'): string {
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : '';
}

/**
 * Runs `<program> <args...> <remote-file> <local-file>`
 *
 * Exit 0 means identical, 1 different, anything else a tool error whose
 * output is still reported. Only a tool that cannot be launched fails.
 */
export class ExternalTemplateDiffer implements TemplateDiffer {
  private readonly program: string;
  private readonly args: string[];

  constructor(
    private readonly command: string,
    private readonly logger?: Logger
  ) {
    const [program, ...args] = command.trim().split(/\s+/).filter(part => part.length > 0);
    if (!program) {
      throw new DiffToolError(command, 'empty command');
    }
    this.program = program;
    this.args = args;
  }

  async diff(input: TemplateDiffInput): Promise<TemplateDiff> {
    const extension = extname(input.localPath) || '.template';

    return tmp.withDir(
      async ({ path }) => {
        const remoteFile = join(path, `${REMOTE_LABEL}${extension}`);
        const localFile = join(path, `${LOCAL_LABEL}${extension}`);
        await Promise.all([writeFile(remoteFile, input.remote, 'utf-8'), writeFile(localFile, input.local, 'utf-8')]);

        this.logger?.debug('Running external differ', { command: this.command });
        return this.run([...this.args, remoteFile, localFile], input.signal);
      },
      { unsafeCleanup: true, prefix: 'stackdiff-' }
    );
  }

  private async run(args: string[], signal?: AbortSignal): Promise<TemplateDiff> {
    try {
      const result = await execa(this.program, args, { signal });
      return { text: result.stdout, status: classifyExitCode(0, result.stdout), exitCode: 0 };
    } catch (error) {
      if (signal?.aborted) {
        throw new PreviewInterruptedError('diff');
      }
      if (typeof error !== 'object' || error === null) {
        throw new DiffToolError(this.command, String(error));
      }

      const exitCode: unknown = Reflect.get(error, 'exitCode');
      if (typeof exitCode !== 'number') {
        const reason = readStringField(error, 'shortMessage') || (error instanceof Error ? error.message : 'failed to start');
        throw new DiffToolError(this.command, reason);
      }

      const stdout = readStringField(error, 'stdout');
      const text = stdout || readStringField(error, 'stderr');
      const status = classifyExitCode(exitCode, stdout);
      if (status === 'tool-error') {
        this.logger?.warn('Differ exited with an unexpected code', { command: this.command, exitCode });
      }
      return { text, status, exitCode };
    }
  }
}

/**
 * Pick the differ for a run: external when a command is configured, built-in otherwise
 */
export function createTemplateDiffer(command: string | undefined, logger?: Logger): TemplateDiffer {
  if (command === undefined || command.trim().length === 0) {
    return new BuiltinTemplateDiffer();
  }
  return new ExternalTemplateDiffer(command, logger);
}
