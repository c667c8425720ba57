/**
 * GFF Tools - Main entry point
 *
 * Byte-exact reading and writing of Generic File Format (GFF) files through an
 * editable, shared tree.
 */

// Document-level API
export { GffDocument, ROOT_STRUCT_ID, DEFAULT_FILE_VERSION } from './gff-document.js';
export type { ReadOptions } from './gff-document.js';

// Resolved tree
export { GffStruct, SYNTHESIZED } from './gff-struct.js';
export type { StructOrigin } from './gff-struct.js';
export { FieldCell, FieldRef } from './field-cell.js';
export {
  FieldAccessors,
  checkValueRange,
  expectField,
  fieldTypeOf,
  isValueOf,
  structsEqual,
  valuesEqual,
} from './field-value.js';
export type { ExoLocString, FieldAccessor, GffValue, LocalizedSubstring, ValueOf } from './field-value.js';
export { breadthFirst, depthFirst, traverse } from './traversal.js';
export type { TraversalOrder } from './traversal.js';

// Binary layer
export { GffBinary } from './gff-binary.js';
export { GffStructureBuilder, buildStructure, layoutHeader } from './gff-builder.js';
export { resolveField, resolveStructure } from './gff-resolver.js';
export type {
  BinaryField,
  BinaryStruct,
  FieldData,
  GffBinaryStructure,
  GffHeader,
  StructLayout,
} from './types/gff-binary-structure.js';
export { FieldType, fieldTypeName, isComplexFieldType, isFieldType } from './types/field-type.js';
export type { FieldTypeName } from './types/field-type.js';
export { Gender, Language, packStringId, unpackStringId } from './types/locale.js';

// String lookup
export { CachingStringResolver, MapStringResolver } from './string-resolver.js';
export type { StringResolver } from './string-resolver.js';

// Text and JSON helpers
export { decodeLabel, encodeLabel } from './utils/legacy-text.js';
export { toJsonTree, valueToJson } from './tree-json.js';
export { parseValueText } from './value-text.js';

export {
  GffAlignmentError,
  GffError,
  GffFieldTypeError,
  GffLookupError,
  GffParseError,
  GffWriteError,
} from './errors.js';
export { NO_STRING_REF } from './constants/gff-layout.js';
