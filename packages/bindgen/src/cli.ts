#!/usr/bin/env node

/**
 * nvrpc-bindgen CLI
 *
 * Generates typed Neovim API bindings from `nvim --api-info`
 */

import { Command, Option } from 'commander';
import { DEFAULT_RUNTIME_MODULE } from './codegen/emitter';
import { DEFAULT_NVIM, DEFAULT_OUTPUT, ENV_NVIM, ENV_RUNTIME } from './config';
import { captureCommand } from './commands/capture';
import { generateCommand } from './commands/generate';
import { inspectCommand } from './commands/inspect';
import { validateCommand } from './commands/validate';

const program = new Command();

const nvimOption = () =>
  new Option('--nvim <path>', 'Neovim executable to query').env(ENV_NVIM).default(DEFAULT_NVIM);
const manifestOption = () =>
  new Option('--manifest <file>', 'Read a captured manifest instead of running nvim');

program
  .name('nvrpc-bindgen')
  .description('Generate typed msgpack-rpc bindings for the Neovim API')
  .version('0.1.0');

program
  .command('generate')
  .description('Generate the bindings module')
  .addOption(nvimOption())
  .addOption(manifestOption())
  .option('-o, --output <path>', 'Output path for the bindings', DEFAULT_OUTPUT)
  .addOption(
    new Option('--runtime <module>', 'Module the bindings import the runtime from')
      .env(ENV_RUNTIME)
      .default(DEFAULT_RUNTIME_MODULE)
  )
  .option('--verbose', 'Show detailed output', false)
  .action(generateCommand);

program
  .command('capture')
  .description('Save the raw API manifest for offline generation')
  .addOption(nvimOption())
  .requiredOption('-o, --output <file>', 'Where to write the manifest bytes')
  .option('--verbose', 'Show detailed output', false)
  .action(captureCommand);

program
  .command('inspect')
  .description('Summarize the API manifest')
  .addOption(nvimOption())
  .addOption(manifestOption())
  .option('--json', 'Print the whole decoded manifest as JSON', false)
  .option('--verbose', 'Show detailed output', false)
  .action(inspectCommand);

program
  .command('validate')
  .description('Check that a generated bindings file parses and exports stubs')
  .argument('<file>', 'Bindings file to validate')
  .option('--verbose', 'Show detailed output', false)
  .action(validateCommand);

program.parse();
