import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import pino, { type Logger } from 'pino';

export const silentLogger: Logger = pino({ level: 'silent' });

export type CapturedLogger = {
  logger: Logger;
  entries: unknown[];
};

export function captureLogger(level = 'debug'): CapturedLogger {
  const entries: unknown[] = [];
  const logger = pino(
    { level, base: undefined },
    {
      write(line: string) {
        entries.push(JSON.parse(line));
      }
    }
  );
  return { logger, entries };
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

export type TempProject = {
  dir: string;
  writeManifest(contents: string): void;
  cleanup(): void;
};

export function createTempProject(manifest?: string): TempProject {
  const dir = mkdtempSync(path.join(os.tmpdir(), 'pydust-config-'));
  const project: TempProject = {
    dir,
    writeManifest(contents: string) {
      writeFileSync(path.join(dir, 'pyproject.toml'), contents, 'utf8');
    },
    cleanup() {
      rmSync(dir, { recursive: true, force: true });
    }
  };
  if (manifest !== undefined) {
    project.writeManifest(manifest);
  }
  return project;
}

export const FASTMOD_MANIFEST = `
[build-system]
requires = ["poetry-core", "ziggy-pydust==1.2.3"]
build-backend = "poetry.core.masonry.api"

[[tool.pydust.ext_module]]
name = "pkg.fastmod"
root = "src/fastmod"
`;
