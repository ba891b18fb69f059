// Decode side: unslicers and the receive stack that drives them.

export {
  type Unslicer,
  type UnslicerState,
  type UnsliceContext,
  type Opener,
  BaseUnslicer,
  whenReady,
} from "./unslicer.ts";

export {
  ListUnslicer,
  TupleUnslicer,
  SetUnslicer,
  DictUnslicer,
  ObjectUnslicer,
  NoneUnslicer,
  BooleanUnslicer,
  BytesUnslicer,
  ReferenceUnslicer,
} from "./unslicers.ts";

export { type UnslicerFactory, UnslicerRegistry } from "./registry.ts";
export { OPENTYPE_LENGTH_LIMIT, OPENTYPE_TOKEN_LIMIT, RootUnslicer } from "./root.ts";
export { type Received, type ReceiveStackOptions, ReceiveStack } from "./receive_stack.ts";
