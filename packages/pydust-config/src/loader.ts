import path from 'node:path';
import type { Logger } from 'pino';
import { loadPydustEnv } from './envConfig';
import { createLogger } from './logger';
import { checkToolVersion, getToolTable, MANIFEST_FILE, readManifest, TOOL_NAME } from './manifest';
import { PydustConfig } from './pydustConfig';
import { resolveToolVersion, type ToolVersionResolver } from './version';

export interface ConfigLoaderOptions {
  /** Directory holding the manifest. Resolved on every uncached load; defaults to `process.cwd()`. */
  cwd?: string | (() => string);
  manifestFile?: string;
  toolName?: string;
  toolVersion?: ToolVersionResolver;
  logger?: Logger;
}

export interface ConfigLoader {
  load(): PydustConfig;
  /** Drops the cached configuration so the next `load()` reads the manifest again. */
  reset(): void;
  isLoaded(): boolean;
}

export function createConfigLoader(options: ConfigLoaderOptions = {}): ConfigLoader {
  let cached: PydustConfig | undefined;
  let logger = options.logger;

  function resolveLogger(): Logger {
    if (!logger) {
      logger = createLogger(loadPydustEnv().logLevel);
    }
    return logger;
  }

  function resolveCwd(): string {
    if (typeof options.cwd === 'function') {
      return options.cwd();
    }
    return options.cwd ?? process.cwd();
  }

  function readConfig(): PydustConfig {
    const log = resolveLogger();
    const manifestPath = path.resolve(resolveCwd(), options.manifestFile ?? MANIFEST_FILE);
    const manifest = readManifest(manifestPath);
    log.debug({ manifestPath }, 'read project manifest');

    checkToolVersion(manifest, {
      toolName: options.toolName ?? TOOL_NAME,
      toolVersion: (options.toolVersion ?? resolveToolVersion)(),
      logger: log
    });

    const config = PydustConfig.fromTable(getToolTable(manifest));
    log.debug({ extModules: config.extModules.length, selfManaged: config.selfManaged }, 'loaded pydust config');
    return config;
  }

  return {
    load() {
      if (cached) {
        resolveLogger().trace('using cached pydust config');
        return cached;
      }
      const config = readConfig();
      cached = config;
      return config;
    },
    reset() {
      cached = undefined;
    },
    isLoaded() {
      return cached !== undefined;
    }
  } satisfies ConfigLoader;
}

const defaultLoader = createConfigLoader();

/** Loads `pyproject.toml` from the working directory once per process. */
export function load(): PydustConfig {
  return defaultLoader.load();
}

export function resetConfigCache(): void {
  defaultLoader.reset();
}
