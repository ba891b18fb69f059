// Encode side: slicers and the send stack that drives them.

export {
  type Slicer,
  type SliceContext,
  BaseSlicer,
  EmitToken,
  Suspend,
} from "./slicer.ts";

export {
  type Primitive,
  PrimitiveSlicer,
  NoneSlicer,
  BooleanSlicer,
  BytesSlicer,
  ListSlicer,
  TupleSlicer,
  SetSlicer,
  DictSlicer,
  ObjectSlicer,
  ReferenceSlicer,
} from "./slicers.ts";

export { type SlicerEntry, SlicerRegistry, describeValue } from "./registry.ts";
export { RootSlicer } from "./root.ts";
export { type SendStackOptions, type TokenSink, SendStack } from "./send_stack.ts";
