import type { JobOptions, PrintContent } from '../models/print-job.model';
import { getToolDialect } from '../models/tool-dialect.model';
import { type BuildError, EmptyPathError, err, InvalidCopiesError, ok, type Result, ScratchIoError } from '../utils/errors';
import { escapeShellArg } from '../utils/shell-escape';
import type { ScratchStorage } from './scratch-storage.service';

const SCRATCH_PREFIX = 'print-job';
const SCRATCH_EXTENSION = 'txt';

export interface BuiltCommand {
  /** The full `sh -c` command line */
  readonly command: string;
  /** Set when inline text was written to scratch storage; the caller owns this file */
  readonly scratchPath?: string;
}

/**
 * Build the command line for one job:
 *
 *   <tool> [-d|-P <dest>] [-n <n>|-#<n>] [-t|-J <title>] {-o key=value}* <content-path>
 *
 * Destination, title and content path are single-quoted. Job options are
 * emitted raw so the tool sees its own `key=value` syntax; callers must keep
 * whitespace and shell metacharacters out of them.
 *
 * Inline text is written to a new scratch file which is left in place.
 */
export function buildPrintCommand(
  options: JobOptions,
  content: PrintContent,
  scratch: ScratchStorage
): Result<BuiltCommand, BuildError> {
  const dialect = getToolDialect(options.variant);
  const tokens: string[] = [dialect.program];

  if (options.destination !== undefined) {
    tokens.push(dialect.destinationFlag, escapeShellArg(options.destination));
  }

  if (options.copies !== undefined) {
    if (!Number.isInteger(options.copies) || options.copies < 0) {
      return err(new InvalidCopiesError(options.copies));
    }
    // BigInt keeps large counts out of exponent notation
    tokens.push(dialect.formatCopies(BigInt(options.copies).toString()));
  }

  if (options.title !== undefined) {
    tokens.push(dialect.titleFlag, escapeShellArg(options.title));
  }

  for (const key of Object.keys(options.jobOptions).sort()) {
    tokens.push('-o', `${key}=${options.jobOptions[key]}`);
  }

  if (content.kind === 'file') {
    if (content.path === '') {
      return err(new EmptyPathError());
    }
    tokens.push(escapeShellArg(content.path));
    return ok({ command: tokens.join(' ') });
  }

  const scratchPath = scratch.newPath(SCRATCH_PREFIX, SCRATCH_EXTENSION);
  const written = scratch.writeAll(scratchPath, content.text);
  if (!written.ok) {
    return err(new ScratchIoError(scratchPath, { cause: written.error }));
  }
  tokens.push(escapeShellArg(scratchPath));
  return ok({ command: tokens.join(' '), scratchPath });
}
