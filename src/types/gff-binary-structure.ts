/**
 * Flat, offset-addressed representation of a GFF file, as laid out on disk.
 */
import type { FieldType } from './field-type.js';

export interface GffHeader {
  /** 4-char file type tag, e.g. "IFO ". */
  readonly fileType: string;
  /** 4-char format version tag, e.g. "V3.2". */
  readonly fileVersion: string;
  readonly structOffset: number;
  readonly structCount: number;
  readonly fieldOffset: number;
  readonly fieldCount: number;
  readonly labelOffset: number;
  readonly labelCount: number;
  readonly fieldDataOffset: number;
  /** Size of the field-data heap in bytes. */
  readonly fieldDataCount: number;
  readonly fieldIndicesOffset: number;
  /** Size of the field-indices array in bytes. */
  readonly fieldIndicesCount: number;
  readonly listIndicesOffset: number;
  /** Size of the list-indices array in bytes. */
  readonly listIndicesCount: number;
}

export interface BinaryStruct {
  readonly typeId: number;
  /** Meaning depends on `fieldCount`; decode with `decodeStructLayout`. */
  readonly dataOrOffset: number;
  readonly fieldCount: number;
}

export interface BinaryField {
  readonly fieldType: FieldType;
  readonly labelIndex: number;
  /** Meaning depends on `fieldType`; decode with `decodeFieldData`. */
  readonly dataOrOffset: number;
}

/**
 * Where a struct's fields are found.
 * `entryIndex` counts 4-byte entries into `fieldIndices`.
 */
export type StructLayout =
  | { readonly kind: 'empty'; readonly literal: number }
  | { readonly kind: 'single'; readonly fieldIndex: number }
  | { readonly kind: 'indices'; readonly entryIndex: number };

/**
 * Where a field's value is found.
 * `entryIndex` counts 4-byte entries into `listIndices`.
 */
export type FieldData =
  | { readonly kind: 'inline'; readonly raw: number }
  | { readonly kind: 'heap'; readonly offset: number }
  | { readonly kind: 'struct'; readonly structIndex: number }
  | { readonly kind: 'list'; readonly entryIndex: number };

export interface GffBinaryStructure {
  readonly header: GffHeader;
  readonly structs: readonly BinaryStruct[];
  readonly fields: readonly BinaryField[];
  readonly labels: readonly string[];
  readonly fieldData: Buffer;
  readonly fieldIndices: readonly number[];
  readonly listIndices: readonly number[];
}
