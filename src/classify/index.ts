export {
  kindOf,
  isNilLike,
  isTextKind,
  isSequenceKind,
  isMappingKind,
  isTypedArray,
  isPlainObject,
  lengthOf,
  ownEntries,
  type ValueKind,
  type TypedArray,
} from "./kinds.js";
export { isZeroValue } from "./zero.js";
export { typeIdentity, sameType, primitiveTag, type PrimitiveTypeTag } from "./identity.js";
