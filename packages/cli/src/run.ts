import fs from 'node:fs';
import {
  ConfigError,
  ContractError,
  ErrorCode,
  ErrorPresenter,
  FileError,
  compileSchemas,
  formatReport,
  isContractError,
  validateSource,
  type CompileOptions,
  type SchemaSource,
} from '@yaml-contract/core';
import { renderCLIView } from './render.js';

export interface RunRequest {
  /** Schema files, loaded into one context in this order */
  schemas: string[];
  /** URI of the schema every file is validated against */
  uri: string;
  files: string[];
  options?: CompileOptions;
  verbose?: boolean;
}

export interface RunIO {
  readFile(file: string): string;
  stdout(text: string): void;
  stderr(text: string): void;
  colors?: boolean;
}

export const nodeIO: RunIO = {
  readFile: (file) => fs.readFileSync(file, 'utf8'),
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

class InputFilesError extends Error {
  constructor(readonly errors: FileError[]) {
    super(errors.map((error) => error.message).join('\n'));
  }
}

/**
 * Load the schemas, validate every document of every file, and print the
 * outcome. Returns the process exit status.
 */
export function run(request: RunRequest, io: RunIO = nodeIO): number {
  try {
    return validateFiles(request, io);
  } catch (error: unknown) {
    return reportFailure(error, io);
  }
}

function validateFiles(request: RunRequest, io: RunIO): number {
  const log = (message: string): void => {
    if (request.verbose) io.stderr(`[yaml-contract] ${message}\n`);
  };

  if (request.schemas.length === 0) {
    throw new ConfigError(
      'no schemas supplied, see the --schema option for information'
    );
  }
  if (request.files.length === 0) {
    throw new ConfigError(
      'no files to validate were supplied, use --help for more information'
    );
  }

  const sources = readFiles(request.schemas, io);
  const context = compileSchemas(sources, request.options);
  if (context.isErr()) throw context.error;
  log(
    `loaded ${context.value.size} schema(s): ${context.value.uris.join(', ')}`
  );

  if (!context.value.getSchema(request.uri)) {
    throw new ConfigError(
      `schema referenced by uri \`${request.uri}\` not found in context`,
      ErrorCode.UNKNOWN_SCHEMA,
      { uri: request.uri }
    );
  }
  log(`validating against ${request.uri}`);

  const inputs = readFiles(request.files, io);
  const reports: string[] = [];

  for (const input of inputs) {
    const report = validateSource(
      context.value,
      request.uri,
      input.text,
      input.filename
    );
    if (report.isErr()) throw report.error;

    log(`${input.filename}: ${report.value.documents} document(s)`);
    if (report.value.failures.length > 0) {
      reports.push(`${input.filename}:\n${formatReport(report.value)}`);
    }
  }

  if (reports.length > 0) {
    io.stderr(reports.join(''));
    return 1;
  }

  io.stdout('all files validated successfully!\n');
  return 0;
}

/** Read every file; unreadable ones are reported together. */
function readFiles(
  files: readonly string[],
  io: RunIO
): Required<SchemaSource>[] {
  const sources: Required<SchemaSource>[] = [];
  const errors: FileError[] = [];

  for (const file of files) {
    try {
      sources.push({ filename: file, text: io.readFile(file) });
    } catch (error: unknown) {
      const cause = error instanceof Error ? error : new Error(String(error));
      errors.push(new FileError(file, cause));
    }
  }

  if (errors.length > 0) throw new InputFilesError(errors);
  return sources;
}

/**
 * Print any thrown value the way the CLI reports errors and return the exit
 * status for it.
 */
export function reportFailure(error: unknown, io: RunIO): number {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: io.colors ?? false });
  const render = (contractError: ContractError): void => {
    io.stderr(renderCLIView(presenter.formatForCLI(contractError)));
  };

  if (error instanceof InputFilesError) {
    error.errors.forEach(render);
    return error.errors[0]?.getExitCode() ?? 1;
  }

  if (isContractError(error)) {
    render(error);
    return error.getExitCode();
  }

  const message = error instanceof Error ? error.message : String(error);
  const internal = new (class extends ContractError {})({
    message: message || 'Unexpected error',
    errorCode: ErrorCode.INTERNAL_ERROR,
  });
  render(internal);
  return internal.getExitCode();
}
