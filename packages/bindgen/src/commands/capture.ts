/**
 * Capture command implementation
 */

import signale from 'signale';
import { NvimProcessSource } from '../manifest/source';
import { writeOutputFile } from '../generate';
import { manifestDigest } from '../utils/digest';

const { Signale } = signale;

interface CaptureOptions {
  nvim: string;
  output: string;
  verbose: boolean;
}

/**
 * Saves the raw `--api-info` bytes so later passes can run without nvim.
 */
export function captureCommand(options: CaptureOptions): void {
  const signale = new Signale({ scope: 'capture', interactive: !options.verbose });
  const source = new NvimProcessSource(options.nvim);

  try {
    signale.await(`Running ${source.describe()}...`);
    const bytes = source.read();
    writeOutputFile(options.output, bytes);
    signale.success(`Captured ${bytes.length} bytes to ${options.output}`);
    if (options.verbose) {
      signale.info(`Manifest sha256: ${manifestDigest(bytes)}`);
    }
  } catch (error) {
    signale.error('Capture failed:', error);
    process.exit(1);
  }
}
