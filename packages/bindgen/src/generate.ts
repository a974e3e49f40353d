/**
 * Generation pipeline: manifest bytes -> value tree -> descriptors -> source
 */

import * as fs from 'fs';
import * as path from 'path';
import { decodeValue } from '@nvrpc/runtime';
import { StubEmitter, type EmitOptions, type SkippedFunction } from './codegen/emitter';
import { projectManifest } from './manifest/project';
import type { ManifestSource } from './manifest/source';
import type { Manifest } from './manifest/types';
import { manifestDigest } from './utils/digest';

export interface GenerateOptions {
  runtimeModule?: EmitOptions['runtimeModule'];
}

export interface GenerateResult {
  source: string;
  manifest: Manifest;
  /** Hex SHA-256 of the manifest bytes */
  digest: string;
  stubs: string[];
  skipped: SkippedFunction[];
}

export interface WriteOptions extends GenerateOptions {
  output: string;
}

/**
 * Decodes the manifest bytes (exactly one value), projects and emits.
 */
export function generateBindings(bytes: Uint8Array, options: GenerateOptions = {}): GenerateResult {
  const manifest = projectManifest(decodeValue(bytes));
  const digest = manifestDigest(bytes);
  const emitted = new StubEmitter().emit(manifest, { runtimeModule: options.runtimeModule, digest });
  return { source: emitted.source, manifest, digest, stubs: emitted.stubs, skipped: emitted.skipped };
}

/**
 * Runs a whole pass against a manifest source and writes the output file.
 */
export function writeBindings(source: ManifestSource, options: WriteOptions): GenerateResult {
  const result = generateBindings(source.read(), options);
  writeOutputFile(options.output, result.source);
  return result;
}

/**
 * Writes a file, creating its directory when needed.
 */
export function writeOutputFile(output: string, contents: string | Uint8Array): void {
  const outputDir = path.dirname(output);
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }
  fs.writeFileSync(output, contents);
}
