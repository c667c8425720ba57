/**
 * JSON view of a document, for dumping and inspection.
 */
import type { FieldCell } from './field-cell.js';
import type { GffValue, LocalizedSubstring } from './field-value.js';
import type { GffDocument } from './gff-document.js';
import type { GffStruct } from './gff-struct.js';
import { Gender, Language } from './types/locale.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

function substringToJson(substring: LocalizedSubstring): JsonValue {
  return {
    language: Language[substring.language],
    gender: Gender[substring.gender],
    text: substring.text,
  };
}

/**
 * 64-bit integers and non-finite floats become strings ('NaN', 'Infinity') and
 * Void data a hex string, since JSON numbers cannot carry them.
 */
export function valueToJson(value: GffValue): JsonValue {
  switch (value.type) {
    case 'DWord64':
    case 'Int64':
      return value.value.toString();
    case 'Float':
    case 'Double':
      return Number.isFinite(value.value) ? value.value : String(value.value);
    case 'Void':
      return Buffer.from(value.value).toString('hex');
    case 'ExoLocString': {
      const json: { [key: string]: JsonValue } = {
        stringRef: value.value.stringRef,
        substrings: value.value.substrings.map(substringToJson),
      };
      if (value.value.resolvedText !== undefined) {
        json.resolvedText = value.value.resolvedText;
      }
      return json;
    }
    case 'Struct':
      return structToJson(value.value);
    case 'List':
      return value.value.map(structToJson);
    default:
      return value.value;
  }
}

function cellToJson(cell: FieldCell): JsonValue {
  return { label: cell.label, type: cell.value.type, value: valueToJson(cell.value) };
}

export function structToJson(struct: GffStruct): JsonValue {
  return { id: struct.id, fields: struct.fields.map(cellToJson) };
}

export function toJsonTree(document: GffDocument): JsonValue {
  return {
    fileType: document.fileType,
    fileVersion: document.fileVersion,
    root: structToJson(document.root),
  };
}
