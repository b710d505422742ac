import { config } from '../config';
import type { JobOptions, PrintContent } from '../models/print-job.model';
import { err, ok, type PrintJobError, type Result, SubmissionFailedError } from '../utils/errors';
import { logger } from '../utils/logger';
import { buildPrintCommand, type BuiltCommand } from './command-builder.service';
import { createShellProcessRunner, type ProcessRunner } from './process-runner.service';
import { createFsScratchStorage, type ScratchStorage } from './scratch-storage.service';

export interface PrinterDeps {
  readonly runner: ProcessRunner;
  readonly scratch: ScratchStorage;
  /** Leave scratch files behind after submission instead of deleting them */
  readonly keepScratchFiles: boolean;
}

export function createDefaultPrinterDeps(): PrinterDeps {
  return {
    runner: createShellProcessRunner(),
    scratch: createFsScratchStorage(),
    keepScratchFiles: config.keepScratchFiles,
  };
}

/** Delete a scratch file once nothing else needs it. Failures are logged, not raised. */
export function releaseScratchFile(built: BuiltCommand, deps: PrinterDeps): void {
  if (built.scratchPath === undefined || deps.keepScratchFiles) return;

  const removed = deps.scratch.remove(built.scratchPath);
  if (!removed.ok) {
    logger.warn({ error: removed.error, scratchPath: built.scratchPath }, 'Failed to remove scratch file');
  }
}

/**
 * Build the command for one job and run it through the shell.
 * The scratch file for inline text is removed once the tool has exited,
 * since `lp`/`lpr` have spooled the data by then.
 */
export async function submitPrintJob(
  options: JobOptions,
  content: PrintContent,
  deps: PrinterDeps
): Promise<Result<BuiltCommand, PrintJobError>> {
  const built = buildPrintCommand(options, content, deps.scratch);
  if (!built.ok) {
    logger.error({ error: built.error, kind: built.error.kind }, 'Failed to build print command');
    return built;
  }

  logger.debug({ command: built.value.command }, 'Submitting print command');

  let succeeded: boolean;
  try {
    succeeded = await deps.runner.run(built.value.command);
  } catch (error) {
    logger.error({ error }, 'Process runner threw');
    succeeded = false;
  } finally {
    releaseScratchFile(built.value, deps);
  }

  if (!succeeded) {
    logger.error({ variant: options.variant, destination: options.destination }, 'Print submission failed');
    return err(new SubmissionFailedError());
  }

  logger.info({ variant: options.variant, destination: options.destination ?? '(system default)' }, 'Print job submitted');
  return ok(built.value);
}

/** One set of job options reused for any number of submissions */
export class Printer {
  constructor(
    readonly options: JobOptions,
    private readonly deps: PrinterDeps = createDefaultPrinterDeps()
  ) {}

  /** Build without executing; inline text is still written to scratch storage */
  buildCommand(content: PrintContent): ReturnType<typeof buildPrintCommand> {
    return buildPrintCommand(this.options, content, this.deps.scratch);
  }

  print(content: PrintContent): Promise<Result<BuiltCommand, PrintJobError>> {
    return submitPrintJob(this.options, content, this.deps);
  }
}
