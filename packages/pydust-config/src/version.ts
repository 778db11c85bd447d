import { readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const packageJsonSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1)
});

export const PACKAGE_JSON_PATH = path.resolve(__dirname, '..', 'package.json');

export type ToolVersionResolver = () => string;

export function readPackageVersion(packageJsonPath: string = PACKAGE_JSON_PATH): string {
  const raw = readFileSync(packageJsonPath, 'utf8');
  return packageJsonSchema.parse(JSON.parse(raw)).version;
}

/** Version of the installed build tool, as recorded in this package's metadata. */
export const resolveToolVersion: ToolVersionResolver = () => readPackageVersion();
