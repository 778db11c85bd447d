import { readFileSync } from 'node:fs';
import type { Logger } from 'pino';
import { parse } from 'smol-toml';
import { InvalidConfigurationError, ManifestError } from './errors';
import { readKey } from './tables';
import { shapes, validateInput, type ManifestTable } from './validation';

export const MANIFEST_FILE = 'pyproject.toml';
export const TOOL_NAME = 'ziggy-pydust';

/** Version reported by local, unpublished installs of the tool. Pins are not enforced for it. */
export const DEVELOPMENT_VERSION = '0.1.0';

export function readManifest(manifestPath: string): ManifestTable {
  let contents: string;
  try {
    contents = readFileSync(manifestPath, 'utf8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw new ManifestError('not_found', manifestPath, err);
    }
    throw err;
  }

  try {
    return parse(contents);
  } catch (err) {
    throw new ManifestError('malformed', manifestPath, err);
  }
}

export function getBuildRequirements(manifest: ManifestTable): string[] {
  const buildSystem = readKey(manifest, 'build-system');
  if (buildSystem === undefined) {
    return [];
  }
  const table = validateInput('build-system', buildSystem, shapes.table);
  const requires = readKey(table, 'requires');
  if (requires === undefined) {
    return [];
  }
  return validateInput('build-system.requires', requires, shapes.stringList);
}

export function getToolTable(manifest: ManifestTable, toolName = 'pydust'): unknown {
  const tool = readKey(manifest, 'tool');
  if (tool === undefined) {
    return {};
  }
  return readKey(validateInput('tool', tool, shapes.table), toolName) ?? {};
}

export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}

/** Extracts the normalised distribution name from a PEP 508 requirement string. */
export function requirementName(requirement: string): string {
  const match = /^\s*([A-Za-z0-9][A-Za-z0-9._-]*)/.exec(requirement);
  return match ? normalizeName(match[1]) : '';
}

export interface VersionCheckOptions {
  toolVersion: string;
  toolName?: string;
  logger?: Logger;
}

/**
 * Poetry does not lock `build-system.requires`, so the installed tool and the manifest pin
 * can drift apart. Every requirement naming the tool must pin exactly the running version.
 */
export function checkToolVersion(manifest: ManifestTable, options: VersionCheckOptions): void {
  const toolName = options.toolName ?? TOOL_NAME;
  if (options.toolVersion === DEVELOPMENT_VERSION) {
    options.logger?.debug({ toolVersion: options.toolVersion }, 'skipping build-system version check');
    return;
  }

  const expected = `${toolName}==${options.toolVersion}`;
  const pins = getBuildRequirements(manifest).filter(
    (requirement) => requirementName(requirement) === normalizeName(toolName)
  );

  if (pins.length === 0) {
    options.logger?.warn({ expected }, `${toolName} is not listed in build-system.requires`);
    return;
  }

  for (const requirement of pins) {
    if (requirement !== expected) {
      throw new InvalidConfigurationError(
        `Detected misconfigured ${toolName}. ` +
          `You must include "${expected}" in build-system.requires in ${MANIFEST_FILE}`
      );
    }
  }
}

function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value;
}
