import { z } from 'zod';
import { UnsupportedFeatureError } from './errors';
import { FsPath } from './fsPath';
import { assertKnownKeys } from './tables';
import { coercePath, listOf, shapes, validateInput } from './validation';

export const ABI3_SUFFIX = '.abi3.so';
export const TEST_BIN_DIR = FsPath.of('zig-out', 'bin');
export const TEST_BIN_SUFFIX = '.test.bin';

const EXT_MODULE_KEYS = ['name', 'root', 'limited_api'] as const;

export interface ExtModuleInit {
  name: string;
  root: FsPath;
  limitedApi?: boolean;
}

/** A single Zig extension module declared under `[[tool.pydust.ext_module]]`. */
export class ExtModule {
  readonly name: string;
  readonly root: FsPath;
  readonly limitedApi: boolean;

  constructor(init: ExtModuleInit) {
    this.name = validateInput('name', init.name, shapes.dottedName);
    this.root = validateInput('root', init.root, shapes.path);
    this.limitedApi = validateInput('limited_api', init.limitedApi ?? true, shapes.boolean);
    Object.freeze(this);
  }

  static fromTable(raw: unknown, index = 0): ExtModule {
    const section = `tool.pydust.ext_module[${index}]`;
    const table = validateInput(section, raw, shapes.table);
    assertKnownKeys(table, EXT_MODULE_KEYS, section);

    return new ExtModule({
      name: validateInput('name', table.name, shapes.dottedName),
      root: validateInput('root', coercePath(table.root), shapes.path),
      limitedApi:
        table.limited_api === undefined
          ? undefined
          : validateInput('limited_api', table.limited_api, shapes.boolean)
    });
  }

  get libname(): string {
    const segments = this.name.split('.');
    return segments[segments.length - 1];
  }

  get installPath(): FsPath {
    // TODO: derive the versioned extension suffix once non-limited API builds are supported.
    if (!this.limitedApi) {
      throw new UnsupportedFeatureError('Only limited API modules are supported right now');
    }
    return FsPath.of(...this.name.split('.')).withSuffix(ABI3_SUFFIX);
  }

  get testBin(): FsPath {
    return TEST_BIN_DIR.join(this.libname).withSuffix(TEST_BIN_SUFFIX);
  }
}

export const extModuleListShape = listOf(
  'ExtModule[]',
  z.custom<ExtModule>((value) => value instanceof ExtModule)
);
