/**
 * ErrorPresenter - pure presentation layer for YangTreeError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import type {
  ErrorContext,
  SerializedError,
  YangTreeError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  workaround?: string;
  cause?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: YangTreeError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      workaround: this.#formatWorkaround(error),
      cause:
        this.env === 'dev' && error.cause !== undefined
          ? error.cause.message
          : undefined,
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth ?? process.stdout.columns ?? 80,
    };
  }

  /** Machine-readable form; no stack outside dev */
  formatForJSON(error: YangTreeError): SerializedError {
    return error.toJSON(this.env);
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (ctx === undefined) return undefined;
    if (ctx.documentPath !== undefined) {
      return `Location: ${ctx.documentPath}`;
    }
    if (ctx.schemaPath !== undefined) {
      return `Location: ${ctx.schemaPath}`;
    }
    if (ctx.module !== undefined) {
      return ctx.revision === undefined
        ? `Module: ${ctx.module}`
        : `Module: ${ctx.module}@${ctx.revision}`;
    }
    if (ctx.setting !== undefined) {
      return `Option: ${ctx.setting}`;
    }
    return undefined;
  }

  #formatWorkaround(error: YangTreeError): string | undefined {
    const first = error.suggestions?.[0];
    return first ?? error.context?.suggestion;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (opt === undefined) return this.env === 'dev';
    return opt;
  }
}

export default ErrorPresenter;
