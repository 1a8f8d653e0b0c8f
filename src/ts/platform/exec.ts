/**
 * Run external commands without a shell
 */

import { execFile } from 'child_process';
import { ExecResult } from '../core/types';

/**
 * A non-zero exit resolves with its code; only spawn failures reject
 */
export function execCommand(file: string, args: string[]): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    execFile(file, args, { windowsHide: true, maxBuffer: 1024 * 1024 }, (error, stdout, stderr) => {
      if (error && typeof error.code !== 'number') {
        reject(error);
        return;
      }
      resolve({
        exitCode: error && typeof error.code === 'number' ? error.code : 0,
        stdout: String(stdout),
        stderr: String(stderr)
      });
    });
  });
}
