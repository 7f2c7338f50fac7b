/**
 * Pathname - canonical hierarchical path value
 *
 * Raw paths from different backend conventions (drive letters, URL schemes,
 * backslashes, trailing separators, `.` and `..` segments) normalize into one
 * comparable form: a root marker followed by `/`-joined segments.
 *
 * @module pathname
 */

import { InvalidPathError } from '../errors';
import { POSIX_CONVENTIONS } from './pathname.types';
import type { PathConventions } from './pathname.types';

const PLAIN_ROOT = '/';
const SCHEME_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):\/\/([^/\\]*)(.*)$/s;
const DRIVE_PATTERN = /^([A-Za-z]):(.*)$/s;

type SplitRoot = { root: string; rest: string; explicit: boolean };

function escapeForClass(char: string): string {
  return char.replace(/[\\\]^-]/g, '\\$&');
}

function separatorPattern(conventions: PathConventions): RegExp {
  if (conventions.separators.length === 0 || conventions.separators.some(s => s.length !== 1)) {
    throw new InvalidPathError(
      conventions.separators.join(''),
      'path conventions need at least one single-character separator',
    );
  }
  return new RegExp(`[${conventions.separators.map(escapeForClass).join('')}]+`);
}

function splitRoot(raw: string, conventions: PathConventions): SplitRoot {
  if (conventions.schemes) {
    const match = SCHEME_PATTERN.exec(raw);
    if (match) {
      const [, scheme = '', authority = '', rest = ''] = match;
      return { root: `${scheme.toLowerCase()}://${authority}/`, rest, explicit: true };
    }
  }
  if (conventions.driveLetters) {
    const match = DRIVE_PATTERN.exec(raw);
    if (match) {
      const [, drive = '', rest = ''] = match;
      return { root: `${drive.toUpperCase()}:/`, rest, explicit: true };
    }
  }
  const leading = conventions.separators.some(s => raw.startsWith(s));
  return { root: PLAIN_ROOT, rest: raw, explicit: leading };
}

/**
 * Applies raw segments onto a base segment stack: drops empty and `.`
 * segments, pops on `..`, refuses to climb above the root.
 */
function applySegments(base: readonly string[], raw: string, conventions: PathConventions, original: string): string[] {
  const stack = [...base];
  for (const segment of raw.split(separatorPattern(conventions))) {
    if (segment === '' || segment === '.') continue;
    if (segment === '..') {
      if (stack.length === 0) {
        throw new InvalidPathError(original, 'ascends above its root');
      }
      stack.pop();
      continue;
    }
    stack.push(segment);
  }
  return stack;
}

function assertWellFormed(raw: string): void {
  if (raw.length === 0) {
    throw new InvalidPathError(raw, 'pathname is empty');
  }
  if (raw.includes('\0')) {
    throw new InvalidPathError(raw, 'pathname contains a NUL character');
  }
}

/**
 * Immutable canonical pathname.
 *
 * Equality, hashing and map keys go through `toString()`, so two raw
 * spellings of the same location are interchangeable.
 *
 * @example
 * ```typescript
 * const p = Pathname.normalize('C:\\docs\\.\\drafts\\..\\README.md', WINDOWS_CONVENTIONS);
 * p.toString();        // 'C:/docs/README.md'
 * p.basename('.md');   // 'README'
 * p.parent()?.toString(); // 'C:/docs'
 * ```
 */
export class Pathname {
  public readonly root: string;
  public readonly segments: readonly string[];
  public readonly conventions: PathConventions;
  private readonly canonical: string;

  private constructor(root: string, segments: readonly string[], conventions: PathConventions) {
    this.root = root;
    this.segments = Object.freeze([...segments]);
    this.conventions = conventions;
    this.canonical = root + segments.join('/');
  }

  static normalize(raw: string, conventions: PathConventions = POSIX_CONVENTIONS): Pathname {
    assertWellFormed(raw);
    const { root, rest } = splitRoot(raw, conventions);
    return new Pathname(root, applySegments([], rest, conventions, raw), conventions);
  }

  static root(conventions: PathConventions = POSIX_CONVENTIONS): Pathname {
    return new Pathname(PLAIN_ROOT, [], conventions);
  }

  /**
   * Whether a raw path names its own root (leading separator, drive or scheme)
   */
  static isAbsolute(raw: string, conventions: PathConventions = POSIX_CONVENTIONS): boolean {
    return splitRoot(raw, conventions).explicit;
  }

  get isRoot(): boolean {
    return this.segments.length === 0;
  }

  get depth(): number {
    return this.segments.length;
  }

  /**
   * Last segment, with `suffix` removed when it is an exact trailing match
   * that leaves something behind. The root's basename is the empty string.
   */
  basename(suffix: string = ''): string {
    const name = this.segments[this.segments.length - 1] ?? '';
    if (suffix !== '' && name.length > suffix.length && name.endsWith(suffix)) {
      return name.slice(0, -suffix.length);
    }
    return name;
  }

  /** Extension without the dot; dotfiles like `.profile` have none */
  get extension(): string {
    const name = this.basename();
    const dot = name.lastIndexOf('.');
    return dot > 0 ? name.slice(dot + 1) : '';
  }

  parent(): Pathname | null {
    if (this.isRoot) return null;
    return new Pathname(this.root, this.segments.slice(0, -1), this.conventions);
  }

  /**
   * Resolves a relative path against this one. Leading separators are
   * redundant; a drive letter or scheme is not a relative path.
   */
  join(relative: string): Pathname {
    if (relative.includes('\0')) {
      throw new InvalidPathError(relative, 'pathname contains a NUL character');
    }
    const split = splitRoot(relative, this.conventions);
    if (split.root !== PLAIN_ROOT) {
      throw new InvalidPathError(relative, `cannot join a rooted path onto ${this.canonical}`);
    }
    const joined = applySegments(this.segments, split.rest, this.conventions, relative);
    return new Pathname(this.root, joined, this.conventions);
  }

  /**
   * Resolves a link target as written on disk: absolute targets normalize
   * on their own, relative ones are taken from this link's parent.
   */
  resolveTarget(raw: string): Pathname {
    if (Pathname.isAbsolute(raw, this.conventions)) {
      return Pathname.normalize(raw, this.conventions);
    }
    assertWellFormed(raw);
    return (this.parent() ?? this).join(raw);
  }

  /** True when `other` lies strictly below this pathname */
  contains(other: Pathname): boolean {
    if (other.root !== this.root || other.segments.length <= this.segments.length) {
      return false;
    }
    return this.segments.every((segment, index) => other.segments[index] === segment);
  }

  /**
   * Path of this pathname below `ancestor`, `/`-joined; empty when equal
   */
  relativeTo(ancestor: Pathname): string {
    if (this.equals(ancestor)) return '';
    if (!ancestor.contains(this)) {
      throw new InvalidPathError(this.canonical, `is not below ${ancestor.toString()}`);
    }
    return this.segments.slice(ancestor.segments.length).join('/');
  }

  equals(other: Pathname): boolean {
    return this.canonical === other.canonical;
  }

  toString(): string {
    return this.canonical;
  }

  toJSON(): string {
    return this.canonical;
  }
}

export function normalize(raw: string, conventions: PathConventions = POSIX_CONVENTIONS): Pathname {
  return Pathname.normalize(raw, conventions);
}

export function join(base: Pathname, relative: string): Pathname {
  return base.join(relative);
}

export function parent(pathname: Pathname): Pathname | null {
  return pathname.parent();
}

export function basename(pathname: Pathname, suffix: string = ''): string {
  return pathname.basename(suffix);
}

export function segments(pathname: Pathname): readonly string[] {
  return pathname.segments;
}
