// Backend-independent object paths.
//
// A path is a list of non-empty segments plus two flags: whether it was
// written rooted ("/a/b") and whether it names a directory prefix ("a/b/").
// Values are immutable; every operation returns a new path.

import { StorageInvalidPathError } from './errors.js';

const SEPARATOR = '/';

// "C:", "c:\foo", "D:/data", "\\server\share", "\\?\C:\"
const PLATFORM_PREFIX = /^(?:[A-Za-z]:(?:$|[\\/])|\\\\)/;

export interface ObjectPathOptions {
  absolute?: boolean;
  directory?: boolean;
}

export class ObjectPath {
  readonly parts: readonly string[];
  readonly isAbsolute: boolean;
  readonly isDirPrefix: boolean;

  private constructor(parts: readonly string[], absolute: boolean, directory: boolean) {
    this.parts = parts;
    this.isAbsolute = absolute;
    // The empty path is the root, never a directory prefix of its own.
    this.isDirPrefix = parts.length > 0 && directory;
  }

  static empty(): ObjectPath {
    return new ObjectPath([], false, false);
  }

  /**
   * Parse a `/`-separated string. Empty segments are dropped, so `a//b`
   * and `a/b` are the same path.
   *
   * @throws StorageInvalidPathError for drive or UNC prefixes
   */
  static parse(text: string): ObjectPath {
    if (PLATFORM_PREFIX.test(text)) {
      throw new StorageInvalidPathError(`${text} (paths must not include a platform prefix)`);
    }

    const parts = text.split(SEPARATOR).filter((part) => part.length > 0);
    return new ObjectPath(parts, text.startsWith(SEPARATOR), text.endsWith(SEPARATOR));
  }

  static fromParts(parts: readonly string[], options: ObjectPathOptions = {}): ObjectPath {
    for (const part of parts) {
      ObjectPath.checkPart(part);
    }
    return new ObjectPath([...parts], options.absolute ?? false, options.directory ?? false);
  }

  /** Accepts either a path or its string form. */
  static from(value: ObjectPath | string): ObjectPath {
    return typeof value === 'string' ? ObjectPath.parse(value) : value;
  }

  get length(): number {
    return this.parts.length;
  }

  /** Last segment, or the empty string for the root. */
  get name(): string {
    return this.parts[this.parts.length - 1] ?? '';
  }

  isEmpty(): boolean {
    return this.parts.length === 0;
  }

  push(part: string): ObjectPath {
    ObjectPath.checkPart(part);
    return new ObjectPath([...this.parts, part], this.isAbsolute, false);
  }

  /** Drop the last segment. Popping the last remaining segment yields the root. */
  pop(): ObjectPath {
    if (this.parts.length <= 1) {
      return new ObjectPath([], this.isAbsolute, false);
    }
    return new ObjectPath(this.parts.slice(0, -1), this.isAbsolute, false);
  }

  /** The containing directory as a directory prefix ("a/b/c" -> "a/b/"). */
  parent(): ObjectPath {
    return this.pop().asDirectory();
  }

  /** Split off the first segment, e.g. a bucket name. */
  shift(): [head: string | undefined, rest: ObjectPath] {
    const [head, ...rest] = this.parts;
    return [head, new ObjectPath(rest, false, this.isDirPrefix)];
  }

  /** Put a segment back at the front; the inverse of `shift`. */
  unshift(part: string): ObjectPath {
    ObjectPath.checkPart(part);
    return new ObjectPath([part, ...this.parts], this.isAbsolute, this.isDirPrefix);
  }

  /** Append `other`; the result is a directory prefix if `other` is one. */
  join(other: ObjectPath): ObjectPath {
    if (other.isEmpty()) {
      return this;
    }
    return new ObjectPath([...this.parts, ...other.parts], this.isAbsolute, other.isDirPrefix);
  }

  asDirectory(): ObjectPath {
    return new ObjectPath(this.parts, this.isAbsolute, true);
  }

  withoutTrailingSeparator(): ObjectPath {
    return new ObjectPath(this.parts, this.isAbsolute, false);
  }

  equals(other: ObjectPath): boolean {
    return (
      this.isDirPrefix === other.isDirPrefix &&
      this.parts.length === other.parts.length &&
      this.parts.every((part, i) => part === other.parts[i])
    );
  }

  /**
   * Prefix test used by listings. Segments compare positionally; the last
   * segment of a non-directory prefix matches any segment that begins with
   * it, so "a/b" is a prefix of "a/bc/d". For a directory prefix the last
   * segment must match exactly and the candidate must lie beneath it (or be
   * a directory prefix itself when it is no longer than the prefix).
   */
  startsWith(prefix: ObjectPath): boolean {
    const count = prefix.parts.length;
    if (count === 0) {
      return true;
    }
    if (this.parts.length < count) {
      return false;
    }

    for (let i = 0; i < count - 1; i++) {
      if (this.parts[i] !== prefix.parts[i]) {
        return false;
      }
    }

    const own = this.parts[count - 1] ?? '';
    const last = prefix.parts[count - 1] ?? '';
    if (prefix.isDirPrefix) {
      return own === last && (this.parts.length > count || this.isDirPrefix);
    }
    return own.startsWith(last);
  }

  toString(): string {
    const body = this.parts.join(SEPARATOR);
    const lead = this.isAbsolute ? SEPARATOR : '';
    const trail = this.isDirPrefix ? SEPARATOR : '';
    return `${lead}${body}${trail}`;
  }

  toJSON(): string {
    return this.toString();
  }

  private static checkPart(part: string): void {
    if (part.length === 0 || part.includes(SEPARATOR)) {
      throw new StorageInvalidPathError(`"${part}" is not a valid path segment`);
    }
  }
}
