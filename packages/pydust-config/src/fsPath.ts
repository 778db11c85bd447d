import path from 'node:path';
import { inspect } from 'node:util';

/**
 * Immutable filesystem path. Manifest strings are converted into `FsPath` values during
 * deserialisation so that path-typed fields can be told apart from plain text.
 */
export class FsPath {
  readonly value: string;

  private constructor(value: string) {
    this.value = value;
    Object.freeze(this);
  }

  static of(...segments: string[]): FsPath {
    if (segments.length === 0) {
      throw new Error('FsPath.of requires at least one segment');
    }
    return new FsPath(path.join(...segments));
  }

  join(...segments: string[]): FsPath {
    return new FsPath(path.join(this.value, ...segments));
  }

  get parent(): FsPath {
    return new FsPath(path.dirname(this.value));
  }

  get name(): string {
    return path.basename(this.value);
  }

  /** Replaces the final extension of the last segment, or appends `suffix` when there is none. */
  withSuffix(suffix: string): FsPath {
    const ext = path.extname(this.value);
    const stem = ext ? this.value.slice(0, -ext.length) : this.value;
    return new FsPath(`${stem}${suffix}`);
  }

  equals(other: FsPath): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }

  [inspect.custom](): string {
    return `FsPath(${JSON.stringify(this.value)})`;
  }
}
