import { describe, expect, test } from 'vitest';
import { FsPath } from '../src/fsPath';
import { TypeMismatchError } from '../src/errors';
import { coercePath, shapes, validateInput } from '../src/validation';
import { catchError } from './helpers';

describe('validateInput', () => {
  test('returns conforming values unchanged', () => {
    const root = FsPath.of('src', 'fastmod');
    expect(validateInput('name', 'pkg.fastmod', shapes.string)).toBe('pkg.fastmod');
    expect(validateInput('root', root, shapes.path)).toBe(root);
    expect(validateInput('zig_exe', null, shapes.optionalPath)).toBeNull();
    expect(validateInput('zig_tests', false, shapes.boolean)).toBe(false);
  });

  test('reports field, value and expected shape on mismatch', () => {
    const error = catchError(() => validateInput('name', 5, shapes.string));
    if (!(error instanceof TypeMismatchError)) {
      throw new Error('expected a TypeMismatchError');
    }
    expect(error.message).toBe('Input of name=5 is not a valid "string".');
    expect(error.field).toBe('name');
    expect(error.value).toBe(5);
    expect(error.expected).toBe('string');
    expect(error.code).toBe('TYPE_MISMATCH');
  });

  test('quotes string values in the message', () => {
    expect(() => validateInput('zig_tests', 'yes', shapes.boolean)).toThrow(
      'Input of zig_tests=\'yes\' is not a valid "boolean".'
    );
  });

  test('rejects bare strings where a path is expected', () => {
    expect(() => validateInput('zig_exe', 'build.zig', shapes.optionalPath)).toThrow(
      'Input of zig_exe=\'build.zig\' is not a valid "path | null".'
    );
  });

  test('renders path values readably', () => {
    expect(() => validateInput('limited_api', FsPath.of('a'), shapes.boolean)).toThrow(
      'Input of limited_api=FsPath("a") is not a valid "boolean".'
    );
  });

  test('dotted module names need non-empty segments', () => {
    expect(validateInput('name', 'a.b.c', shapes.dottedName)).toBe('a.b.c');
    expect(() => validateInput('name', '', shapes.dottedName)).toThrow(TypeMismatchError);
    expect(() => validateInput('name', 'pkg..mod', shapes.dottedName)).toThrow(TypeMismatchError);
    expect(() => validateInput('name', 'pkg.', shapes.dottedName)).toThrow(TypeMismatchError);
  });

  test('tables exclude arrays and null', () => {
    expect(validateInput('tool', { a: 1 }, shapes.table)).toEqual({ a: 1 });
    expect(() => validateInput('tool', [], shapes.table)).toThrow(TypeMismatchError);
    expect(() => validateInput('tool', null, shapes.table)).toThrow(TypeMismatchError);
  });
});

describe('coercePath', () => {
  test('converts non-empty strings to paths', () => {
    const coerced = coercePath('src/fastmod');
    expect(coerced).toBeInstanceOf(FsPath);
    expect(String(coerced)).toBe('src/fastmod');
  });

  test('leaves other values for validation to reject', () => {
    expect(coercePath(3)).toBe(3);
    expect(coercePath('')).toBe('');
    expect(coercePath(null)).toBeNull();
  });
});
