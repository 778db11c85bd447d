import { inspect } from 'node:util';

export type PydustConfigErrorCode =
  | 'TYPE_MISMATCH'
  | 'UNSUPPORTED_FEATURE'
  | 'INVALID_CONFIGURATION'
  | 'MANIFEST_NOT_FOUND'
  | 'MANIFEST_MALFORMED';

export class PydustConfigError extends Error {
  readonly code: PydustConfigErrorCode;

  constructor(code: PydustConfigErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PydustConfigError';
    this.code = code;
  }
}

export function formatValue(value: unknown): string {
  return inspect(value, { depth: 2, breakLength: Infinity });
}

export class TypeMismatchError extends PydustConfigError {
  readonly field: string;
  readonly value: unknown;
  readonly expected: string;

  constructor(field: string, value: unknown, expected: string) {
    super('TYPE_MISMATCH', `Input of ${field}=${formatValue(value)} is not a valid "${expected}".`);
    this.name = 'TypeMismatchError';
    this.field = field;
    this.value = value;
    this.expected = expected;
  }
}

export class UnsupportedFeatureError extends PydustConfigError {
  constructor(message: string) {
    super('UNSUPPORTED_FEATURE', message);
    this.name = 'UnsupportedFeatureError';
  }
}

export class InvalidConfigurationError extends PydustConfigError {
  constructor(message: string) {
    super('INVALID_CONFIGURATION', message);
    this.name = 'InvalidConfigurationError';
  }
}

export type ManifestErrorKind = 'not_found' | 'malformed';

export class ManifestError extends PydustConfigError {
  readonly kind: ManifestErrorKind;
  readonly path: string;

  constructor(kind: ManifestErrorKind, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      kind === 'not_found' ? 'MANIFEST_NOT_FOUND' : 'MANIFEST_MALFORMED',
      kind === 'not_found'
        ? `Manifest ${path} was not found`
        : `Manifest ${path} could not be parsed: ${reason}`,
      { cause }
    );
    this.name = 'ManifestError';
    this.kind = kind;
    this.path = path;
  }
}
