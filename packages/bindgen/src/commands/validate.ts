/**
 * Validate command implementation
 */

import signale from 'signale';
import * as fs from 'fs';
import { analyzeBindings } from '../codegen/validate';

const { Signale } = signale;

interface ValidateOptions {
  verbose: boolean;
}

export function validateCommand(file: string, options: ValidateOptions): void {
  const signale = new Signale({ scope: 'validate', interactive: !options.verbose });

  try {
    signale.await(`Validating ${file}...`);

    if (!fs.existsSync(file)) {
      throw new Error(`Bindings file not found: ${file}`);
    }

    const summary = analyzeBindings(fs.readFileSync(file, 'utf-8'), file);
    if (summary.functions.length === 0) {
      throw new Error('No call stubs exported');
    }
    if (options.verbose) {
      signale.info(`Handle classes: ${summary.classes.join(', ') || 'none'}`);
      signale.info(`Enums: ${summary.enums.join(', ')}`);
    }

    signale.success(
      `Bindings valid: ${summary.functions.length} stubs, ${summary.classes.length} handle classes`
    );
  } catch (error) {
    signale.error('Validation failed:', error);
    process.exit(1);
  }
}
