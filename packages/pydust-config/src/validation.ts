import { z } from 'zod';
import { TypeMismatchError } from './errors';
import { FsPath } from './fsPath';

export type ManifestTable = Record<string, unknown>;

export interface InputShape<T> {
  description: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export function defineShape<T>(
  description: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): InputShape<T> {
  return { description, schema };
}

const DOTTED_NAME_PATTERN = /^[^.\s]+(\.[^.\s]+)*$/;

const pathSchema = z.custom<FsPath>((value) => value instanceof FsPath);

const tableSchema = z.custom<ManifestTable>(
  (value) => typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
);

export const shapes = {
  string: defineShape('string', z.string()),
  dottedName: defineShape('dotted module name', z.string().regex(DOTTED_NAME_PATTERN)),
  boolean: defineShape('boolean', z.boolean()),
  path: defineShape('path', pathSchema),
  optionalPath: defineShape('path | null', pathSchema.nullable()),
  table: defineShape('table', tableSchema),
  list: defineShape('list', z.array(z.unknown())),
  stringList: defineShape('string[]', z.array(z.string()))
} as const;

export function listOf<T>(description: string, element: z.ZodType<T, z.ZodTypeDef, unknown>): InputShape<T[]> {
  return defineShape(description, z.array(element));
}

/**
 * Returns `input` when it conforms to `shape`, otherwise throws a {@link TypeMismatchError}
 * naming the field, the offending value and the expected shape.
 */
export function validateInput<T>(name: string, input: unknown, shape: InputShape<T>): T {
  const result = shape.schema.safeParse(input);
  if (!result.success) {
    throw new TypeMismatchError(name, input, shape.description);
  }
  return result.data;
}

/** Manifest path fields arrive as strings; anything else is left for `validateInput` to reject. */
export function coercePath(input: unknown): unknown {
  if (typeof input === 'string' && input.trim().length > 0) {
    return FsPath.of(input);
  }
  return input;
}
