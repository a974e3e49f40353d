/**
 * Execution utilities
 */

import { execFileSync } from 'child_process';
import { toError } from '@nvrpc/runtime';

/** Upper bound for captured stdout; the API manifest is a few hundred KB. */
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/**
 * Runs a program to completion and returns its raw stdout
 *
 * @param file - Program to execute, resolved through PATH
 * @param args - Arguments passed verbatim, no shell involved
 */
export function captureOutput(file: string, args: readonly string[]): Uint8Array {
  try {
    return execFileSync(file, args, {
      encoding: 'buffer',
      stdio: ['ignore', 'pipe', 'pipe'],
      maxBuffer: MAX_OUTPUT_BYTES,
      windowsHide: true,
    });
  } catch (error) {
    throw new Error(`Command failed: ${[file, ...args].join(' ')}\n${toError(error).message}`);
  }
}
