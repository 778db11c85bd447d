export { FsPath } from './fsPath';
export {
  PydustConfigError,
  TypeMismatchError,
  UnsupportedFeatureError,
  InvalidConfigurationError,
  ManifestError,
  formatValue,
  type PydustConfigErrorCode,
  type ManifestErrorKind
} from './errors';
export {
  validateInput,
  defineShape,
  listOf,
  coercePath,
  shapes,
  type InputShape,
  type ManifestTable
} from './validation';
export {
  ExtModule,
  ABI3_SUFFIX,
  TEST_BIN_DIR,
  TEST_BIN_SUFFIX,
  type ExtModuleInit
} from './extModule';
export {
  PydustConfig,
  DEFAULT_BUILD_ZIG,
  PYDUST_BUILD_ZIG,
  type PydustConfigInit,
  type PydustConfigJson
} from './pydustConfig';
export {
  readManifest,
  checkToolVersion,
  getBuildRequirements,
  getToolTable,
  requirementName,
  normalizeName,
  MANIFEST_FILE,
  TOOL_NAME,
  DEVELOPMENT_VERSION,
  type VersionCheckOptions
} from './manifest';
export { resolveToolVersion, readPackageVersion, type ToolVersionResolver } from './version';
export {
  createConfigLoader,
  load,
  resetConfigCache,
  type ConfigLoader,
  type ConfigLoaderOptions
} from './loader';
export { createLogger, createLoggerOptions, type Logger } from './logger';
export {
  loadEnvConfig,
  loadPydustEnv,
  enumVar,
  EnvConfigError,
  LOG_LEVELS,
  type LogLevel,
  type PydustEnv,
  type EnvSource
} from './envConfig';
