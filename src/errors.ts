import type { FailureReason, TemplateField } from './types.js';

export type ErrorCode =
  | 'TEMPLATE_INVALID'
  | 'MISSING_FIELD'
  | 'SETUP_FAILED'
  | 'CONFIG_INVALID'
  | 'STORE_CONFLICT';

export class TidyError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = 'TidyError';
  }
}

export class TemplateError extends TidyError {
  constructor(
    message: string,
    public readonly template: string,
    public readonly position: number
  ) {
    super(`${message} at position ${position} in "${template}"`, 'TEMPLATE_INVALID');
    this.name = 'TemplateError';
  }
}

export class RenderError extends TidyError {
  constructor(public readonly field: TemplateField) {
    super(`Track is missing required field "${field}"`, 'MISSING_FIELD');
    this.name = 'RenderError';
  }
}

export class SetupError extends TidyError {
  constructor(message: string) {
    super(message, 'SETUP_FAILED');
    this.name = 'SetupError';
  }
}

export class ConfigError extends TidyError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}

export class StoreError extends TidyError {
  constructor(message: string) {
    super(message, 'STORE_CONFLICT');
    this.name = 'StoreError';
  }
}

const TRANSIENT_CODES = new Set(['EAGAIN', 'EBUSY', 'EMFILE', 'ENFILE', 'ETIMEDOUT']);

function errnoCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return null;
  }

  const { code } = error;

  return typeof code === 'string' ? code : null;
}

export function isTransientError(error: unknown): boolean {
  const code = errnoCode(error);
  return code !== null && TRANSIENT_CODES.has(code);
}

export function classifyFsError(error: unknown): FailureReason {
  switch (errnoCode(error)) {
    case 'ENOENT':
      return 'SourceMissing';
    case 'EACCES':
    case 'EPERM':
    case 'EROFS':
      return 'PermissionDenied';
    case 'EEXIST':
      return 'TargetExists';
    default:
      return 'IOError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
