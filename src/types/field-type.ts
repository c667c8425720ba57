/**
 * Field kinds as tagged on the wire (0–15).
 */
export enum FieldType {
  Byte = 0,
  Char = 1,
  Word = 2,
  Short = 3,
  DWord = 4,
  Int = 5,
  DWord64 = 6,
  Int64 = 7,
  Float = 8,
  Double = 9,
  ExoString = 10,
  ResRef = 11,
  ExoLocString = 12,
  Void = 13,
  Struct = 14,
  List = 15,
}

export type FieldTypeName = keyof typeof FieldType;

export function isFieldType(value: number): value is FieldType {
  return Number.isInteger(value) && value >= FieldType.Byte && value <= FieldType.List;
}

/**
 * A kind is complex when its value does not fit in the record's 4-byte slot,
 * i.e. `dataOrOffset` points somewhere else.
 */
export function isComplexFieldType(type: FieldType): boolean {
  switch (type) {
    case FieldType.Byte:
    case FieldType.Char:
    case FieldType.Word:
    case FieldType.Short:
    case FieldType.DWord:
    case FieldType.Int:
    case FieldType.Float:
      return false;
    default:
      return true;
  }
}

const FIELD_TYPE_NAMES: readonly FieldTypeName[] = [
  'Byte', 'Char', 'Word', 'Short', 'DWord', 'Int', 'DWord64', 'Int64',
  'Float', 'Double', 'ExoString', 'ResRef', 'ExoLocString', 'Void', 'Struct', 'List',
];

export function fieldTypeName(type: FieldType): FieldTypeName {
  return FIELD_TYPE_NAMES[type];
}
