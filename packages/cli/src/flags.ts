import { ConfigError, type CompileOptions } from '@yaml-contract/core';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  schema?: string[];
  uri?: string;
  maxRefDepth?: string | number;
  checkRefs?: boolean;
  verbose?: boolean;
  // Allow additional CLI options that we don't process
  [key: string]: unknown;
}

/**
 * Commander argument parser for repeatable `--schema <file>`; keeps the
 * order in which files were given.
 */
export function collectSchema(
  value: string,
  previous: string[] = []
): string[] {
  return [...previous, value];
}

/**
 * Resolve `--max-ref-depth` into a non-negative integer, or undefined to
 * keep the default.
 */
export function resolveMaxRefDepth(value: unknown): number | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  const num = typeof value === 'number' ? value : Number(String(value));
  if (!Number.isInteger(num) || num < 0) {
    throw new ConfigError(
      `Invalid --max-ref-depth value "${String(value)}". ` +
        'Expected a non-negative integer.'
    );
  }
  return num;
}

/**
 * Parse CLI options into compile options for the schema set
 */
export function parseCompileOptions(options: CliOptions): CompileOptions {
  const compileOptions: CompileOptions = {};

  const maxReferenceDepth = resolveMaxRefDepth(options.maxRefDepth);
  if (maxReferenceDepth !== undefined) {
    compileOptions.maxReferenceDepth = maxReferenceDepth;
  }
  if (options.checkRefs === true) {
    compileOptions.checkReferences = true;
  }

  return compileOptions;
}
