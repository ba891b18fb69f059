// Tessera constraints
//
// Schema objects that bound what an unslicer will accept, checked before
// token bodies are buffered and before child structures are built.

export {
  type Constraint,
  type ConstraintLike,
  type OpenType,
  type Taster,
  BaseConstraint,
  AnyConstraint,
  Any,
  StringConstraint,
  IntegerConstraint,
  NumberConstraint,
  BooleanConstraint,
  BytesConstraint,
  NothingConstraint,
  Nothing,
  ChoiceOf,
  Optional,
  adapt,
  isConstraint,
} from "./constraint.ts";

export {
  DEFAULT_MAX_LENGTH,
  ListOf,
  SetOf,
  TupleOf,
  DictOf,
  ObjectOf,
  type ObjectOfOptions,
} from "./containers.ts";

export { checkValue } from "./conforms.ts";
