import dotenv from 'dotenv';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { ToolVariant } from './models/tool-dialect.model';

dotenv.config();

// In dev: src/ sits one level below the project root. Built: dist/src/ sits two.
const packageJsonCandidates = [
  path.join(__dirname, '..', 'package.json'),
  path.join(__dirname, '..', '..', 'package.json'),
];

function readVersion(): string {
  for (const p of packageJsonCandidates) {
    if (!fs.existsSync(p)) continue;
    const pkg: unknown = JSON.parse(fs.readFileSync(p, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  }
  return '0.0.0';
}

function parseVariant(raw: string | undefined): ToolVariant {
  if (raw === undefined || raw === '' || raw === 'lp') return 'lp';
  if (raw === 'lpr') return 'lpr';
  throw new Error(`PRINT_TOOL must be "lp" or "lpr", got "${raw}"`);
}

function parseList(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

export const config = {
  port: parseInt(process.env.PORT || '39600', 10),
  host: process.env.HOST || '127.0.0.1',
  // Browser origins allowed to call the API; empty means no cross-origin access
  corsOrigins: parseList(process.env.CORS_ORIGINS),
  logLevel: process.env.LOG_LEVEL || 'info',
  defaultPrinter: process.env.DEFAULT_PRINTER || '',
  defaultVariant: parseVariant(process.env.PRINT_TOOL),
  scratchDir: process.env.SCRATCH_DIR || os.tmpdir(),
  keepScratchFiles: process.env.KEEP_SCRATCH_FILES === 'true',
  shellPath: process.env.SHELL_PATH || '/bin/sh',
  version: readVersion(),
} as const;
