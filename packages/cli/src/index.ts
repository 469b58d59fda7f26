#!/usr/bin/env node

// CLI entry point
// - Command name: `yaml-contract`.
// - Loads every --schema file into one context, then validates each
//   document of each input file against the schema named by --uri.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  collectSchema,
  parseCompileOptions,
  type CliOptions,
} from './flags.js';
import { nodeIO, reportFailure, run, type RunIO } from './run.js';

const program = new Command();

program
  .name('yaml-contract')
  .description(
    'Validate YAML and JSON documents against yaml-contract schemas'
  )
  .version('0.1.0')
  .argument('[files...]', 'Documents to validate')
  .option(
    '-s, --schema <file>',
    'Schema file to load (repeatable, loaded in order)',
    collectSchema,
    []
  )
  .requiredOption('-u, --uri <uri>', 'URI of the schema to validate against')
  .option(
    '--max-ref-depth <number>',
    'Maximum number of $ref hops followed per document'
  )
  .option('--check-refs', 'Reject schemas whose $ref targets are missing')
  .option('-v, --verbose', 'Print progress information to stderr')
  .action(function (files: string[], options: CliOptions) {
    const io: RunIO = { ...nodeIO, colors: process.stderr.isTTY };
    let exitCode: number;
    try {
      exitCode = run(
        {
          schemas: options.schema ?? [],
          uri: options.uri ?? '',
          files,
          options: parseCompileOptions(options),
          verbose: options.verbose === true,
        },
        io
      );
    } catch (error: unknown) {
      exitCode = reportFailure(error, io);
    }
    if (exitCode !== 0) process.exit(exitCode);
  });

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
