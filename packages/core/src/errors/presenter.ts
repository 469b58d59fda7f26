/**
 * ErrorPresenter - pure presentation layer for ContractError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import {
  CompileError,
  DocumentError,
  type ContractError,
  type ErrorContext,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  /** Flattened error tree, one `#<path>: <message>` line per failure */
  report?: string;
  colors: boolean;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: ContractError): CLIErrorView {
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      report: this.#formatReport(error),
      colors: this.#shouldUseColors(this.options.colors),
    };
  }

  // Helpers
  #formatTitle(error: ContractError): string {
    if (error instanceof CompileError) {
      return `Error ${error.errorCode}: schema compilation failed`;
    }
    if (error instanceof DocumentError) {
      return `Error ${error.errorCode}: document does not match schema`;
    }
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatReport(error: ContractError): string | undefined {
    if (error instanceof CompileError || error instanceof DocumentError) {
      return error.report;
    }
    return undefined;
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx?.file) return undefined;
    if (ctx.line === undefined) return `Location: ${ctx.file}`;
    const column = ctx.column === undefined ? '' : `:${ctx.column}`;
    return `Location: ${ctx.file}:${ctx.line}${column}`;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }
}

export default ErrorPresenter;
