import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import { err, ok, type Result } from '../utils/errors';

/** Where inline print text is materialized so it can be passed to the tool by path */
export interface ScratchStorage {
  /** A fresh path no other call has returned */
  newPath(prefix: string, extension: string): string;
  /** Write `data` verbatim, creating or truncating the file */
  writeAll(filePath: string, data: string | Uint8Array): Result<void>;
  remove(filePath: string): Result<void>;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Scratch files named `<prefix>-<uuid>.<ext>` under `dir` */
export function createFsScratchStorage(dir: string = config.scratchDir): ScratchStorage {
  return {
    newPath(prefix, extension) {
      return path.join(dir, `${prefix}-${uuidv4()}.${extension}`);
    },

    writeAll(filePath, data) {
      try {
        fs.writeFileSync(filePath, data);
        return ok(undefined);
      } catch (error) {
        return err(toError(error));
      }
    },

    remove(filePath) {
      try {
        fs.unlinkSync(filePath);
        return ok(undefined);
      } catch (error) {
        return err(toError(error));
      }
    },
  };
}
