import { execFile } from 'node:child_process';

import type { CommandExecutor } from './types.js';

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/**
 * Real CommandExecutor using child_process. No shell is involved; `file`
 * and `args` are passed as-is.
 */
export function createCommandExecutor(): CommandExecutor {
  return {
    exec(file, args, options) {
      return new Promise((resolve) => {
        execFile(
          file,
          [...args],
          {
            cwd: options.cwd,
            timeout: options.timeoutMs,
            signal: options.signal,
            encoding: 'utf-8',
            maxBuffer: MAX_OUTPUT_BYTES,
          },
          (error, stdout, stderr) => {
            if (!error) {
              resolve({ stdout, stderr, exitCode: 0 });
              return;
            }
            let exitCode = 1;
            if (typeof error.code === 'number') {
              exitCode = error.code;
            } else if (error.code === 'ENOENT') {
              exitCode = 127;
            }
            resolve({ stdout, stderr: stderr || error.message, exitCode });
          },
        );
      });
    },
  };
}
