/**
 * Typed error class for shell adapter operations
 */

export type ShellErrorCode =
  | 'NOT_IMPLEMENTED'
  | 'UNSUPPORTED_SHELL'
  | 'INVALID_ADAPTER';

export class ShellError extends Error {
  readonly code: ShellErrorCode;
  readonly shell?: string;

  constructor(code: ShellErrorCode, message: string, shell?: string) {
    super(message);
    this.name = 'ShellError';
    this.code = code;
    this.shell = shell;
  }
}
