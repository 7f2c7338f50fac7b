/**
 * Listing traversal
 *
 * Depth-first, pre-order walk driven by a compiled filter: children are
 * enumerated through the adapter, `accepts` decides inclusion and
 * `recursesInto` decides descent. Descent is tracked by real (link-resolved)
 * pathname so a link back into an ancestor is reported instead of looping.
 *
 * @module listing
 */

import { CyclicStructureError, NotFoundError } from '../errors';
import type { FilterEvaluator, FilterSubject } from '../filter';
import type { Logger } from '../logger';
import type { Pathname } from '../pathname';

/**
 * What the traversal needs from a directory node. `FileNode` satisfies it.
 */
export interface TraversableNode<N> extends FilterSubject {
  /** Immediate children, in adapter enumeration order */
  children(): Promise<N[]>;
  /** Pathname with the link chain of the final segment resolved */
  getRealPathname(): Promise<Pathname>;
}

/**
 * Lists everything below `directory` that the evaluator accepts.
 * The directory itself is never part of the result.
 */
export async function traverse<N extends TraversableNode<N>>(
  directory: N,
  evaluator: FilterEvaluator<N>,
  logger?: Logger,
): Promise<N[]> {
  const results: N[] = [];
  const active = new Set<string>();
  await walk(directory, await directory.getRealPathname(), evaluator, active, results, logger, false);
  return results;
}

/**
 * Applies the evaluator to one child. Returns the real pathname to descend
 * into, or null when the child is not descended into.
 */
async function inspect<N extends TraversableNode<N>>(
  child: N,
  parentReal: Pathname,
  evaluator: FilterEvaluator<N>,
  results: N[],
  logger: Logger | undefined,
): Promise<Pathname | null> {
  try {
    if (await evaluator.accepts(child)) {
      results.push(child);
    }
    if (!(await evaluator.recursesInto(child))) {
      return null;
    }
    return (await child.getType()) === 'link'
      ? await child.getRealPathname()
      : parentReal.join(child.pathname.basename());
  } catch (error) {
    // entity removed between enumeration and inspection
    if (error instanceof NotFoundError) {
      logger?.debug(`Skipping vanished entry ${child.pathname.toString()}`);
      return null;
    }
    throw error;
  }
}

async function walk<N extends TraversableNode<N>>(
  directory: N,
  real: Pathname,
  evaluator: FilterEvaluator<N>,
  active: Set<string>,
  results: N[],
  logger: Logger | undefined,
  descended: boolean,
): Promise<void> {
  let children: N[];
  try {
    children = await directory.children();
  } catch (error) {
    // directory removed between inspection and enumeration
    if (descended && error instanceof NotFoundError) {
      logger?.debug(`Skipping vanished directory ${directory.pathname.toString()}`);
      return;
    }
    throw error;
  }

  active.add(real.toString());

  for (const child of children) {
    const childReal = await inspect(child, real, evaluator, results, logger);
    if (childReal === null) continue;

    if (active.has(childReal.toString())) {
      throw new CyclicStructureError(child.pathname.toString(), childReal.toString());
    }

    logger?.debug(`Descending into ${child.pathname.toString()}`);
    await walk(child, childReal, evaluator, active, results, logger, true);
  }

  active.delete(real.toString());
}
