/**
 * Unit tests for command-line configuration
 */

import {
  DEFAULT_OUTPUT,
  resolveGenerateConfig,
  resolveSource,
} from '../../packages/bindgen/src/config';
import { FileManifestSource, NvimProcessSource } from '../../packages/bindgen/src/manifest/source';

describe('resolveSource', () => {
  it('should prefer a captured manifest file', () => {
    const source = resolveSource({ nvim: 'nvim', manifest: 'api-info.msgpack' });
    expect(source).toBeInstanceOf(FileManifestSource);
    expect(source.describe()).toBe('api-info.msgpack');
  });

  it('should run nvim otherwise', () => {
    const source = resolveSource({ nvim: '/opt/nvim/bin/nvim' });
    expect(source).toBeInstanceOf(NvimProcessSource);
    expect(source.describe()).toBe('/opt/nvim/bin/nvim --api-info');
  });

  it('should fall back to nvim on PATH for an empty binary', () => {
    expect(resolveSource({ nvim: '' }).describe()).toBe('nvim --api-info');
  });
});

describe('resolveGenerateConfig', () => {
  it('should fill in defaults', () => {
    const config = resolveGenerateConfig({ nvim: 'nvim', output: '', runtime: '', verbose: false });
    expect(config.output).toBe(DEFAULT_OUTPUT);
    expect(config.runtimeModule).toBe('@nvrpc/runtime');
    expect(config.verbose).toBe(false);
  });

  it('should keep explicit values', () => {
    const config = resolveGenerateConfig({
      nvim: 'nvim',
      manifest: 'captured.msgpack',
      output: 'lib/nvim.ts',
      runtime: '../runtime',
      verbose: true,
    });
    expect(config.output).toBe('lib/nvim.ts');
    expect(config.runtimeModule).toBe('../runtime');
    expect(config.source.describe()).toBe('captured.msgpack');
  });
});
