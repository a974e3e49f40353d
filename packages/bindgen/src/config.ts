/**
 * Command-line configuration
 */

import { DEFAULT_RUNTIME_MODULE } from './codegen/emitter';
import { FileManifestSource, NvimProcessSource, type ManifestSource } from './manifest/source';

export const DEFAULT_NVIM = 'nvim';
export const DEFAULT_OUTPUT = 'src/generated/nvim.ts';

export const ENV_NVIM = 'NVRPC_NVIM';
export const ENV_RUNTIME = 'NVRPC_RUNTIME';

/** Options shared by every command that needs a manifest */
export interface SourceOptions {
  nvim: string;
  manifest?: string;
  verbose: boolean;
}

export interface GenerateCommandOptions extends SourceOptions {
  output: string;
  runtime: string;
}

export interface GenerateConfig {
  source: ManifestSource;
  output: string;
  runtimeModule: string;
  verbose: boolean;
}

/**
 * A captured manifest file wins over running nvim.
 */
export function resolveSource(options: Pick<SourceOptions, 'nvim' | 'manifest'>): ManifestSource {
  if (options.manifest !== undefined) {
    return new FileManifestSource(options.manifest);
  }
  return new NvimProcessSource(options.nvim || DEFAULT_NVIM);
}

export function resolveGenerateConfig(options: GenerateCommandOptions): GenerateConfig {
  return {
    source: resolveSource(options),
    output: options.output || DEFAULT_OUTPUT,
    runtimeModule: options.runtime || DEFAULT_RUNTIME_MODULE,
    verbose: options.verbose,
  };
}
