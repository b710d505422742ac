import { vi } from 'vitest';
import type { ProcessRunner } from '../../src/services/process-runner.service';
import type { ScratchStorage } from '../../src/services/scratch-storage.service';
import { err, ok } from '../../src/utils/errors';

export interface MemoryScratchStorage extends ScratchStorage {
  readonly files: Map<string, string>;
  failWrites: boolean;
}

/** Scratch storage backed by a Map; paths are `/scratch/<prefix>-<n>.<ext>` */
export function createMemoryScratchStorage(): MemoryScratchStorage {
  let counter = 0;
  const files = new Map<string, string>();
  const storage: MemoryScratchStorage = {
    files,
    failWrites: false,
    newPath(prefix, extension) {
      counter += 1;
      return `/scratch/${prefix}-${counter}.${extension}`;
    },
    writeAll(filePath, data) {
      if (storage.failWrites) return err(new Error('disk full'));
      files.set(filePath, typeof data === 'string' ? data : Buffer.from(data).toString('utf-8'));
      return ok(undefined);
    },
    remove(filePath) {
      if (!files.delete(filePath)) return err(new Error(`no such file: ${filePath}`));
      return ok(undefined);
    },
  };
  return storage;
}

export function createFakeRunner(succeeds = true) {
  const run = vi.fn(async (_commandLine: string) => succeeds);
  const runner: ProcessRunner = { run };
  return { runner, run };
}
