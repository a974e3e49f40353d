/**
 * Manifest acquisition
 *
 * The generator only ever asks for "the manifest bytes, or a failure". Any
 * failure here is fatal for the generation pass; nothing is retried.
 */

import * as fs from 'fs';
import { ManifestError, toError } from '@nvrpc/runtime';
import { captureOutput } from '../utils/exec';

export interface ManifestSource {
  /** Where the bytes come from, for log lines and error messages */
  describe(): string;
  read(): Uint8Array;
}

/**
 * Runs `nvim --api-info` and returns its stdout.
 */
export class NvimProcessSource implements ManifestSource {
  constructor(private readonly binary: string = 'nvim') {}

  describe(): string {
    return `${this.binary} --api-info`;
  }

  read(): Uint8Array {
    let bytes: Uint8Array;
    try {
      bytes = captureOutput(this.binary, ['--api-info']);
    } catch (error) {
      throw ManifestError.unavailable(this.describe(), toError(error));
    }
    if (bytes.length === 0) {
      throw ManifestError.unavailable(this.describe(), new Error('empty output'));
    }
    return bytes;
  }
}

/**
 * Reads manifest bytes captured earlier, e.g. with `nvrpc-bindgen capture`.
 */
export class FileManifestSource implements ManifestSource {
  constructor(private readonly path: string) {}

  describe(): string {
    return this.path;
  }

  read(): Uint8Array {
    try {
      return fs.readFileSync(this.path);
    } catch (error) {
      throw ManifestError.unavailable(this.describe(), toError(error));
    }
  }
}

export class BytesManifestSource implements ManifestSource {
  constructor(
    private readonly bytes: Uint8Array,
    private readonly label = 'in-memory manifest'
  ) {}

  describe(): string {
    return this.label;
  }

  read(): Uint8Array {
    return this.bytes;
  }
}
