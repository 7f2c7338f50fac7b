export {
  compileFilters,
  decodeListFlags,
  globPattern,
  predicate,
  recursive,
  toSpecifications,
  typeMask,
  visibility,
} from './filter';
export { ListFlags, TypeBits, VisibilityBits } from './filter.types';
export type {
  CompileOptions,
  FilterEvaluator,
  FilterInput,
  FilterSpecification,
  FilterSubject,
  NodePredicate,
} from './filter.types';
