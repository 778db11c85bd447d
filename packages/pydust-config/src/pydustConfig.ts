import { InvalidConfigurationError } from './errors';
import { ExtModule, extModuleListShape } from './extModule';
import { FsPath } from './fsPath';
import { assertKnownKeys, readKey } from './tables';
import { coercePath, shapes, validateInput } from './validation';

export const DEFAULT_BUILD_ZIG = 'build.zig';
export const PYDUST_BUILD_ZIG = 'pydust.build.zig';

const TOOL_PYDUST_KEYS = ['zig_exe', 'build_zig', 'zig_tests', 'self_managed', 'ext_module'] as const;

export interface PydustConfigInit {
  zigExe?: FsPath | null;
  buildZig?: FsPath;
  /** Whether Zig tests are collected alongside the Python test suite. */
  zigTests?: boolean;
  /**
   * When true the user maintains module definitions in their own build.zig; otherwise
   * `extModules` drives a generated one.
   */
  selfManaged?: boolean;
  extModules?: readonly ExtModule[] | null;
}

export interface PydustConfigJson {
  zigExe: string | null;
  buildZig: string;
  pydustBuildZig: string;
  zigTests: boolean;
  selfManaged: boolean;
  extModules: Array<{
    name: string;
    root: string;
    limitedApi: boolean;
    libname: string;
    installPath: string | null;
    testBin: string;
  }>;
}

/** Model of the `[tool.pydust]` table of a pyproject.toml. */
export class PydustConfig {
  readonly zigExe: FsPath | null;
  readonly buildZig: FsPath;
  readonly zigTests: boolean;
  readonly selfManaged: boolean;
  readonly extModules: readonly ExtModule[];

  constructor(init: PydustConfigInit = {}) {
    this.zigExe = validateInput('zig_exe', init.zigExe ?? null, shapes.optionalPath);
    this.buildZig = validateInput('build_zig', init.buildZig ?? FsPath.of(DEFAULT_BUILD_ZIG), shapes.path);
    this.zigTests = validateInput('zig_tests', init.zigTests ?? true, shapes.boolean);
    this.selfManaged = validateInput('self_managed', init.selfManaged ?? false, shapes.boolean);

    // The manifest key is singular so each [[tool.pydust.ext_module]] entry reads naturally.
    this.extModules =
      init.extModules === undefined || init.extModules === null
        ? Object.freeze([])
        : Object.freeze(validateInput('ext_module', init.extModules, extModuleListShape));

    if (this.selfManaged && this.extModules.length > 0) {
      throw new InvalidConfigurationError(
        'ext_modules cannot be defined when using Pydust in self-managed mode.'
      );
    }
    Object.freeze(this);
  }

  static fromTable(raw: unknown): PydustConfig {
    const table = validateInput('tool.pydust', raw ?? {}, shapes.table);
    assertKnownKeys(table, TOOL_PYDUST_KEYS, 'tool.pydust');

    const zigExe = readKey(table, 'zig_exe');
    const buildZig = readKey(table, 'build_zig');
    const zigTests = readKey(table, 'zig_tests');
    const selfManaged = readKey(table, 'self_managed');
    const extModule = readKey(table, 'ext_module');

    return new PydustConfig({
      zigExe: zigExe === undefined ? null : validateInput('zig_exe', coercePath(zigExe), shapes.optionalPath),
      buildZig: buildZig === undefined ? undefined : validateInput('build_zig', coercePath(buildZig), shapes.path),
      zigTests: zigTests === undefined ? undefined : validateInput('zig_tests', zigTests, shapes.boolean),
      selfManaged:
        selfManaged === undefined ? undefined : validateInput('self_managed', selfManaged, shapes.boolean),
      extModules:
        extModule === undefined
          ? undefined
          : validateInput('ext_module', extModule, shapes.list).map((entry, index) =>
              ExtModule.fromTable(entry, index)
            )
    });
  }

  get pydustBuildZig(): FsPath {
    return this.buildZig.parent.join(PYDUST_BUILD_ZIG);
  }

  toJSON(): PydustConfigJson {
    return {
      zigExe: this.zigExe ? this.zigExe.toString() : null,
      buildZig: this.buildZig.toString(),
      pydustBuildZig: this.pydustBuildZig.toString(),
      zigTests: this.zigTests,
      selfManaged: this.selfManaged,
      extModules: this.extModules.map((module) => ({
        name: module.name,
        root: module.root.toString(),
        limitedApi: module.limitedApi,
        libname: module.libname,
        installPath: module.limitedApi ? module.installPath.toString() : null,
        testBin: module.testBin.toString()
      }))
    };
  }
}
