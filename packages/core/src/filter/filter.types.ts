import type { NodeType } from '../adapter';
import type { Pathname } from '../pathname';

/**
 * Type bits for `type` filter specifications.
 */
export const TypeBits = {
  FILE: 0x1,
  DIRECTORY: 0x2,
  LINK: 0x4,
  /** Everything that is not a link */
  OPAQUE: 0x8,
} as const;

/**
 * Visibility bits for `visibility` filter specifications.
 */
export const VisibilityBits = {
  HIDDEN: 0x1,
  VISIBLE: 0x2,
} as const;

/**
 * Flat listing flags, decoded into specifications when a number is passed
 * to `ls()`.
 */
export const ListFlags = {
  /** Hidden and visible entries alike */
  ALL: 1,
  HIDDEN: 2,
  VISIBLE: 4,
  FILES: 128,
  DIRECTORIES: 256,
  LINKS: 512,
  OPAQUE: 1024,
  RECURSIVE: 8192,
} as const;

/**
 * What the engine needs from a node. `FileNode` satisfies it.
 */
export interface FilterSubject {
  readonly pathname: Pathname;
  /** Own type, links not followed */
  getType(): Promise<NodeType>;
  /** Directory test with links followed */
  isDirectory(): Promise<boolean>;
}

export type NodePredicate<N extends FilterSubject> = (node: N) => boolean | Promise<boolean>;

export type TypeMaskSpec = { kind: 'type'; mask: number };
export type VisibilityMaskSpec = { kind: 'visibility'; mask: number };
export type GlobPatternSpec = { kind: 'glob'; pattern: string };
export type PredicateSpec<N extends FilterSubject> = { kind: 'predicate'; test: NodePredicate<N> };
export type RecursiveSpec = { kind: 'recursive'; enabled: boolean };

export type FilterSpecification<N extends FilterSubject = FilterSubject> =
  | TypeMaskSpec
  | VisibilityMaskSpec
  | GlobPatternSpec
  | PredicateSpec<N>
  | RecursiveSpec;

/**
 * Accepted by `compileFilters()` and `ls()`: a specification, a glob string,
 * a predicate function or a `ListFlags` bitmask.
 */
export type FilterInput<N extends FilterSubject = FilterSubject> =
  | FilterSpecification<N>
  | string
  | number
  | NodePredicate<N>;

export interface CompileOptions {
  /** Basename prefix marking hidden entries. Default: "." */
  hiddenPrefix?: string;
}

export interface FilterEvaluator<N extends FilterSubject = FilterSubject> {
  /** Whether listing descends at all */
  readonly recursive: boolean;
  accepts(node: N): Promise<boolean>;
  recursesInto(node: N): Promise<boolean>;
}
