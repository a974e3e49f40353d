/**
 * Inspect command implementation
 */

import signale from 'signale';
import { decodeValue, fromValue } from '@nvrpc/runtime';
import { resolveSource, type SourceOptions } from '../config';
import { projectManifest } from '../manifest/project';
import type { Manifest } from '../manifest/types';

const { Signale } = signale;

interface InspectOptions extends SourceOptions {
  json: boolean;
}

export function describeManifest(manifest: Manifest): string[] {
  const { version } = manifest;
  const prerelease = version.prerelease ? '-dev' : '';
  const deprecated = manifest.functions.filter(fn => fn.deprecatedSince !== undefined).length;
  return [
    `Neovim ${version.major}.${version.minor}.${version.patch}${prerelease}`,
    `API level ${version.apiLevel} (compatible with ${version.apiCompatible})${version.apiPrerelease ? ', prerelease' : ''}`,
    `Functions: ${manifest.functions.length} (${deprecated} deprecated)`,
    `Handle kinds: ${manifest.types.map(kind => kind.name).join(', ') || 'none'}`,
    `Error types: ${manifest.errorTypes.map(entry => entry.name).join(', ') || 'none'}`,
    `UI options: ${manifest.uiOptions.length}`,
    `UI events: ${manifest.uiEvents.length}`,
  ];
}

export function inspectCommand(options: InspectOptions): void {
  // stdout carries the report
  const signale = new Signale({
    scope: 'inspect',
    interactive: !options.verbose,
    stream: process.stderr,
  });
  const source = resolveSource(options);

  try {
    signale.await(`Reading manifest from ${source.describe()}...`);
    const value = decodeValue(source.read());
    if (options.json) {
      process.stdout.write(`${JSON.stringify(fromValue(value), null, 2)}\n`);
      return;
    }
    for (const line of describeManifest(projectManifest(value))) {
      process.stdout.write(`${line}\n`);
    }
  } catch (error) {
    signale.error('Inspection failed:', error);
    process.exit(1);
  }
}
