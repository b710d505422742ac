import { spawn } from 'child_process';
import { config } from '../config';
import { logger } from '../utils/logger';

/** Executes a complete command line and reports whether it exited with status 0 */
export interface ProcessRunner {
  run(commandLine: string): Promise<boolean>;
}

/** Runs `<shell> -c <commandLine>`; output is discarded */
export function createShellProcessRunner(shellPath: string = config.shellPath): ProcessRunner {
  return {
    run(commandLine) {
      return new Promise((resolve) => {
        const child = spawn(shellPath, ['-c', commandLine], {
          stdio: 'ignore',
          windowsHide: true,
        });

        child.once('error', (error) => {
          logger.error({ error, shellPath }, 'Failed to spawn print command');
          resolve(false);
        });

        child.once('close', (code, signal) => {
          if (code !== 0) {
            logger.warn({ code, signal }, 'Print command exited unsuccessfully');
          }
          resolve(code === 0);
        });
      });
    },
  };
}
