/**
 * FilterEngine
 *
 * Compiles an ordered list of filter specifications into one evaluator.
 * Declarative specs of the same category OR together (two type masks select
 * the union of their types); categories AND together; every predicate is its
 * own required condition. `recursive` never affects acceptance.
 *
 * @module filter
 */

import picomatch from 'picomatch';
import { InvalidFilterError } from '../errors';
import type { NodeType } from '../adapter';
import { ListFlags, TypeBits, VisibilityBits } from './filter.types';
import type {
  CompileOptions,
  FilterEvaluator,
  FilterInput,
  FilterSpecification,
  FilterSubject,
  NodePredicate,
} from './filter.types';

const ALL_TYPE_BITS = TypeBits.FILE | TypeBits.DIRECTORY | TypeBits.LINK | TypeBits.OPAQUE;
const ALL_VISIBILITY_BITS = VisibilityBits.HIDDEN | VisibilityBits.VISIBLE;
const ALL_LIST_FLAGS = Object.values(ListFlags).reduce((acc: number, flag) => acc | flag, 0);

export function typeMask(mask: number): FilterSpecification {
  return { kind: 'type', mask };
}

export function visibility(mask: number): FilterSpecification {
  return { kind: 'visibility', mask };
}

export function globPattern(pattern: string): FilterSpecification {
  return { kind: 'glob', pattern };
}

export function predicate<N extends FilterSubject>(test: NodePredicate<N>): FilterSpecification<N> {
  return { kind: 'predicate', test };
}

export function recursive(enabled: boolean = true): FilterSpecification {
  return { kind: 'recursive', enabled };
}

/**
 * Decodes a `ListFlags` bitmask into specifications.
 */
export function decodeListFlags(flags: number): FilterSpecification[] {
  if (!Number.isInteger(flags) || flags <= 0 || (flags & ~ALL_LIST_FLAGS) !== 0) {
    throw new InvalidFilterError(`unknown list flags 0x${flags.toString(16)}`);
  }

  const specs: FilterSpecification[] = [];

  let types = 0;
  if (flags & ListFlags.FILES) types |= TypeBits.FILE;
  if (flags & ListFlags.DIRECTORIES) types |= TypeBits.DIRECTORY;
  if (flags & ListFlags.LINKS) types |= TypeBits.LINK;
  if (flags & ListFlags.OPAQUE) types |= TypeBits.OPAQUE;
  if (types) specs.push(typeMask(types));

  let visible = 0;
  if (flags & ListFlags.ALL) visible |= ALL_VISIBILITY_BITS;
  if (flags & ListFlags.HIDDEN) visible |= VisibilityBits.HIDDEN;
  if (flags & ListFlags.VISIBLE) visible |= VisibilityBits.VISIBLE;
  if (visible) specs.push(visibility(visible));

  if (flags & ListFlags.RECURSIVE) specs.push(recursive(true));

  return specs;
}

/**
 * Turns shorthand inputs into tagged specifications.
 */
export function toSpecifications<N extends FilterSubject>(inputs: readonly FilterInput<N>[]): FilterSpecification<N>[] {
  const specs: FilterSpecification<N>[] = [];
  for (const input of inputs) {
    if (typeof input === 'string') {
      specs.push(globPattern(input));
    } else if (typeof input === 'number') {
      specs.push(...decodeListFlags(input));
    } else if (typeof input === 'function') {
      specs.push(predicate(input));
    } else {
      specs.push(input);
    }
  }
  return specs;
}

function typeBitsOf(type: NodeType): number {
  switch (type) {
    case 'file':
      return TypeBits.FILE | TypeBits.OPAQUE;
    case 'directory':
      return TypeBits.DIRECTORY | TypeBits.OPAQUE;
    case 'link':
      return TypeBits.LINK;
    default:
      return TypeBits.OPAQUE;
  }
}

class CompiledFilter<N extends FilterSubject> implements FilterEvaluator<N> {
  constructor(
    private readonly types: number | null,
    private readonly visibilities: number | null,
    private readonly glob: ((name: string) => boolean) | null,
    private readonly predicates: readonly NodePredicate<N>[],
    private readonly hiddenPrefix: string,
    public readonly recursive: boolean,
  ) {}

  async accepts(node: N): Promise<boolean> {
    const name = node.pathname.basename();

    if (this.visibilities !== null) {
      const bit = name.startsWith(this.hiddenPrefix) ? VisibilityBits.HIDDEN : VisibilityBits.VISIBLE;
      if ((this.visibilities & bit) === 0) return false;
    }

    if (this.glob !== null && !this.glob(name)) {
      return false;
    }

    if (this.types !== null) {
      const type = await node.getType();
      if ((this.types & typeBitsOf(type)) === 0) return false;
    }

    for (const test of this.predicates) {
      if (!(await test(node))) return false;
    }

    return true;
  }

  async recursesInto(node: N): Promise<boolean> {
    if (!this.recursive) return false;
    return node.isDirectory();
  }
}

/**
 * Compiles filter inputs into an evaluator.
 *
 * @example
 * ```typescript
 * const evaluator = compileFilters([typeMask(TypeBits.FILE), '*.md', recursive()]);
 * await evaluator.accepts(node);
 * ```
 */
export function compileFilters<N extends FilterSubject = FilterSubject>(
  inputs: readonly FilterInput<N>[],
  options: CompileOptions = {},
): FilterEvaluator<N> {
  const hiddenPrefix = options.hiddenPrefix ?? '.';
  if (hiddenPrefix === '') {
    throw new InvalidFilterError('hidden prefix must not be empty');
  }

  let types: number | null = null;
  let visibilities: number | null = null;
  const patterns: string[] = [];
  const predicates: NodePredicate<N>[] = [];
  let recursion = false;

  for (const spec of toSpecifications(inputs)) {
    switch (spec.kind) {
      case 'type':
        if (spec.mask <= 0 || (spec.mask & ~ALL_TYPE_BITS) !== 0) {
          throw new InvalidFilterError(`invalid type mask 0x${spec.mask.toString(16)}`);
        }
        types = (types ?? 0) | spec.mask;
        break;
      case 'visibility':
        if (spec.mask <= 0 || (spec.mask & ~ALL_VISIBILITY_BITS) !== 0) {
          throw new InvalidFilterError(`invalid visibility mask 0x${spec.mask.toString(16)}`);
        }
        visibilities = (visibilities ?? 0) | spec.mask;
        break;
      case 'glob':
        if (spec.pattern === '') {
          throw new InvalidFilterError('glob pattern must not be empty');
        }
        patterns.push(spec.pattern);
        break;
      case 'predicate':
        predicates.push(spec.test);
        break;
      case 'recursive':
        recursion = spec.enabled;
        break;
    }
  }

  const glob = patterns.length > 0 ? picomatch(patterns, { dot: true, nonegate: true, posix: true }) : null;

  return new CompiledFilter(types, visibilities, glob, predicates, hiddenPrefix, recursion);
}
