/**
 * Resolved field values: one tagged variant per GFF field kind.
 */
import type { GffStruct } from './gff-struct.js';
import type { Gender, Language } from './types/locale.js';
import { FieldType, type FieldTypeName } from './types/field-type.js';
import { GffFieldTypeError } from './errors.js';

/** One language/gender override of a localized string. */
export interface LocalizedSubstring {
  readonly language: Language;
  readonly gender: Gender;
  readonly text: string;
}

export interface ExoLocString {
  /** String-table reference, or `NO_STRING_REF` when the string has none. */
  readonly stringRef: number;
  readonly substrings: readonly LocalizedSubstring[];
  /** Text looked up from the string table while reading. Never written back. */
  readonly resolvedText?: string;
}

export type GffValue =
  | { readonly type: 'Byte'; readonly value: number }
  | { readonly type: 'Char'; readonly value: number }
  | { readonly type: 'Word'; readonly value: number }
  | { readonly type: 'Short'; readonly value: number }
  | { readonly type: 'DWord'; readonly value: number }
  | { readonly type: 'Int'; readonly value: number }
  | { readonly type: 'DWord64'; readonly value: bigint }
  | { readonly type: 'Int64'; readonly value: bigint }
  | {
      readonly type: 'Float';
      readonly value: number;
      /** Stored bit pattern of a NaN read from a file, written back while the value is still NaN. */
      readonly bits?: number;
    }
  | { readonly type: 'Double'; readonly value: number }
  | { readonly type: 'ExoString'; readonly value: string }
  | { readonly type: 'ResRef'; readonly value: string }
  | { readonly type: 'ExoLocString'; readonly value: ExoLocString }
  | { readonly type: 'Void'; readonly value: Uint8Array }
  | { readonly type: 'Struct'; readonly value: GffStruct }
  | { readonly type: 'List'; readonly value: readonly GffStruct[] };

export type ValueOf<K extends FieldTypeName> = Extract<GffValue, { readonly type: K }>['value'];

export function fieldTypeOf(value: GffValue): FieldType {
  return FieldType[value.type];
}

export function isValueOf<K extends FieldTypeName>(
  value: GffValue,
  type: K
): value is Extract<GffValue, { readonly type: K }> {
  return value.type === type;
}

/**
 * Unwraps a value of the expected kind.
 * @throws {GffFieldTypeError} If the value is of another kind
 */
export function expectField<K extends FieldTypeName>(value: GffValue, type: K): ValueOf<K> {
  if (!isValueOf(value, type)) {
    throw new GffFieldTypeError(type, value.type);
  }
  return value.value;
}

/**
 * Reads and writes one kind of value through a field cell.
 */
export interface FieldAccessor<T> {
  readonly type: FieldTypeName;
  read(value: GffValue): T;
  write(value: T): GffValue;
}

function accessor<K extends FieldTypeName>(
  type: K,
  wrap: (value: ValueOf<K>) => GffValue
): FieldAccessor<ValueOf<K>> {
  return { type, read: (value: GffValue) => expectField(value, type), write: wrap };
}

export const FieldAccessors = {
  Byte: accessor('Byte', (value) => ({ type: 'Byte', value })),
  Char: accessor('Char', (value) => ({ type: 'Char', value })),
  Word: accessor('Word', (value) => ({ type: 'Word', value })),
  Short: accessor('Short', (value) => ({ type: 'Short', value })),
  DWord: accessor('DWord', (value) => ({ type: 'DWord', value })),
  Int: accessor('Int', (value) => ({ type: 'Int', value })),
  DWord64: accessor('DWord64', (value) => ({ type: 'DWord64', value })),
  Int64: accessor('Int64', (value) => ({ type: 'Int64', value })),
  Float: accessor('Float', (value) => ({ type: 'Float', value })),
  Double: accessor('Double', (value) => ({ type: 'Double', value })),
  ExoString: accessor('ExoString', (value) => ({ type: 'ExoString', value })),
  ResRef: accessor('ResRef', (value) => ({ type: 'ResRef', value })),
  ExoLocString: accessor('ExoLocString', (value) => ({ type: 'ExoLocString', value })),
  Void: accessor('Void', (value) => ({ type: 'Void', value })),
  Struct: accessor('Struct', (value) => ({ type: 'Struct', value })),
  List: accessor('List', (value) => ({ type: 'List', value })),
} as const;

const INTEGER_RANGES = {
  Byte: [0, 0xff],
  Char: [0, 0xffffffff],
  Word: [0, 0xffff],
  Short: [-0x8000, 0x7fff],
  DWord: [0, 0xffffffff],
  Int: [-0x80000000, 0x7fffffff],
} as const;

const BIGINT_RANGES = {
  DWord64: [0n, 0xffffffffffffffffn],
  Int64: [-0x8000000000000000n, 0x7fffffffffffffffn],
} as const;

/**
 * Checks that a value fits the width of its kind.
 * @returns A description of the problem, or undefined when the value fits
 */
export function checkValueRange(value: GffValue): string | undefined {
  switch (value.type) {
    case 'Byte':
    case 'Char':
    case 'Word':
    case 'Short':
    case 'DWord':
    case 'Int': {
      const [min, max] = INTEGER_RANGES[value.type];
      if (!Number.isInteger(value.value) || value.value < min || value.value > max) {
        return `${value.type} value ${value.value} is outside ${min}..${max}`;
      }
      return undefined;
    }
    case 'DWord64':
    case 'Int64': {
      const [min, max] = BIGINT_RANGES[value.type];
      if (value.value < min || value.value > max) {
        return `${value.type} value ${value.value} is outside ${min}..${max}`;
      }
      return undefined;
    }
    default:
      return undefined;
  }
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, index) => byte === b[index]);
}

function locStringsEqual(a: ExoLocString, b: ExoLocString): boolean {
  return a.stringRef === b.stringRef
    && a.substrings.length === b.substrings.length
    && a.substrings.every((substring, index) => {
      const other = b.substrings[index];
      return substring.language === other.language
        && substring.gender === other.gender
        && substring.text === other.text;
    });
}

/**
 * Structural equality of two values. Struct origins and looked-up string-table
 * text are not compared.
 */
export function valuesEqual(a: GffValue, b: GffValue): boolean {
  switch (a.type) {
    case 'ExoLocString':
      return b.type === 'ExoLocString' && locStringsEqual(a.value, b.value);
    case 'Void':
      return b.type === 'Void' && bytesEqual(a.value, b.value);
    case 'Struct':
      return b.type === 'Struct' && structsEqual(a.value, b.value);
    case 'List':
      return b.type === 'List'
        && a.value.length === b.value.length
        && a.value.every((struct, index) => structsEqual(struct, b.value[index]));
    default:
      return a.type === b.type && Object.is(a.value, b.value);
  }
}

export function structsEqual(a: GffStruct, b: GffStruct): boolean {
  return a.id === b.id
    && a.fields.length === b.fields.length
    && a.fields.every((cell, index) => {
      const other = b.fields[index];
      return cell.label === other.label && valuesEqual(cell.value, other.value);
    });
}
