/**
 * Generate command implementation
 */

import signale from 'signale';
import { resolveGenerateConfig, type GenerateCommandOptions } from '../config';
import { generateBindings, writeOutputFile } from '../generate';

const { Signale } = signale;

export function generateCommand(options: GenerateCommandOptions): void {
  const config = resolveGenerateConfig(options);
  const signale = new Signale({ scope: 'generate', interactive: !config.verbose });

  try {
    signale.await(`Reading manifest from ${config.source.describe()}...`);
    const bytes = config.source.read();
    signale.success(`Manifest read (${bytes.length} bytes)`);

    signale.await('Generating bindings...');
    const result = generateBindings(bytes, { runtimeModule: config.runtimeModule });
    signale.success(
      `Generated ${result.stubs.length} stubs for API level ${result.manifest.version.apiLevel}`
    );
    if (config.verbose) {
      signale.info(`Manifest sha256: ${result.digest}`);
      signale.info(`Runtime module: ${config.runtimeModule}`);
      signale.info(
        `Handle kinds: ${result.manifest.types.map(kind => `${kind.name}=${kind.id}`).join(', ')}`
      );
    }
    if (result.skipped.length > 0) {
      signale.warn(`Skipped ${result.skipped.length} functions without a stub`);
      for (const skipped of result.skipped) {
        signale.warn(`  ${skipped.name}: ${skipped.reason}`);
      }
    }

    signale.await(`Writing ${config.output}...`);
    writeOutputFile(config.output, result.source);
    signale.success(`Bindings written to ${config.output}`);
  } catch (error) {
    signale.error('Generation failed:', error);
    process.exit(1);
  }
}
