import { Router, Request, Response } from 'express';
import { config } from '../config';
import { fileContent, JobOptionsBuilder, textContent, type JobOptions, type PrintContent } from '../models/print-job.model';
import { buildPrintCommand } from '../services/command-builder.service';
import { releaseScratchFile, submitPrintJob, type PrinterDeps } from '../services/printer.service';
import { errorMessage, type PrintJobError, type PrintJobErrorKind } from '../utils/errors';
import { printRequestSchema, type PrintRequest } from '../validators/print.validator';

const STATUS_BY_KIND: Record<PrintJobErrorKind, number> = {
  EmptyPath: 400,
  InvalidCopies: 400,
  ScratchIoError: 500,
  SubmissionFailed: 502,
};

function toJobOptions(parsed: PrintRequest): JobOptions {
  const builder = new JobOptionsBuilder()
    .destinationIf(parsed.printer ?? (config.defaultPrinter || undefined))
    .jobOptions(parsed.options)
    .variant(parsed.variant ?? config.defaultVariant);
  if (parsed.copies !== undefined) builder.copies(parsed.copies);
  if (parsed.title !== undefined) builder.title(parsed.title);
  return builder.build();
}

function toContent(parsed: PrintRequest): PrintContent {
  return parsed.file !== undefined ? fileContent(parsed.file) : textContent(parsed.text ?? '');
}

function sendJobError(res: Response, error: PrintJobError): void {
  res.status(STATUS_BY_KIND[error.kind]).json({ success: false, error: error.message, kind: error.kind });
}

function parseRequest(req: Request, res: Response): PrintRequest | undefined {
  const parsed = printRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((issue) => issue.message).join('; ');
    res.status(400).json({ success: false, error: msg });
    return undefined;
  }
  return parsed.data;
}

export function createPrintRouter(deps: PrinterDeps): Router {
  const router = Router();

  /** POST /api/print - Build the lp/lpr command and run it */
  router.post('/', async (req: Request, res: Response) => {
    const parsed = parseRequest(req, res);
    if (!parsed) return;

    try {
      const result = await submitPrintJob(toJobOptions(parsed), toContent(parsed), deps);
      if (!result.ok) {
        sendJobError(res, result.error);
        return;
      }
      res.json({ success: true, command: result.value.command });
    } catch (error) {
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  /** POST /api/print/preview - Build the command without running it */
  router.post('/preview', (req: Request, res: Response) => {
    const parsed = parseRequest(req, res);
    if (!parsed) return;

    const result = buildPrintCommand(toJobOptions(parsed), toContent(parsed), deps.scratch);
    if (!result.ok) {
      sendJobError(res, result.error);
      return;
    }
    // Nothing will read the preview's scratch file, so drop it regardless of keepScratchFiles
    releaseScratchFile(result.value, { ...deps, keepScratchFiles: false });
    res.json({ success: true, command: result.value.command });
  });

  return router;
}
