import { z } from 'zod';
import { TOOL_VARIANTS } from '../models/tool-dialect.model';

// Job options reach the shell unquoted as `-o key=value`, so only shell-inert characters pass
const JOB_OPTION_KEY = /^[A-Za-z0-9._-]+$/;
const JOB_OPTION_VALUE = /^[A-Za-z0-9._:,+\/-]+$/;

const jobOptionsSchema = z.record(
  z.string().regex(JOB_OPTION_KEY, 'Job option keys may only contain letters, digits, ".", "_" and "-"'),
  z.string().regex(JOB_OPTION_VALUE, 'Job option values may only contain letters, digits and ". _ : , + / -"')
);

export const printRequestSchema = z
  .object({
    printer: z.string().optional(),
    copies: z.number().int().min(0).max(Number.MAX_SAFE_INTEGER).optional(),
    title: z.string().optional(),
    options: jobOptionsSchema.default({}),
    variant: z.enum(TOOL_VARIANTS).optional(),
    text: z.string().optional(),
    file: z.string().optional(),
  })
  .refine((body) => (body.text === undefined) !== (body.file === undefined), {
    message: 'Exactly one of "text" or "file" is required',
  });

export type PrintRequest = z.infer<typeof printRequestSchema>;
