/**
 * Parses a value typed on the command line into the kind a field already holds.
 */
import { GffError } from './errors.js';
import { checkValueRange, type ExoLocString, type GffValue, type LocalizedSubstring } from './field-value.js';
import { Gender, Language } from './types/locale.js';

function parseNumber(text: string, kind: string): number {
  const value = Number(text.trim());
  if (text.trim() === '' || Number.isNaN(value)) {
    throw new GffError(`"${text}" is not a valid ${kind} value`);
  }
  return value;
}

function parseBigInt(text: string, kind: string): bigint {
  try {
    return BigInt(text.trim());
  } catch (error) {
    throw new GffError(`"${text}" is not a valid ${kind} value`, error);
  }
}

/**
 * Replaces the English masculine substring, adding it when missing.
 */
function withEnglishText(current: ExoLocString, text: string): ExoLocString {
  const isEnglish = (substring: LocalizedSubstring): boolean =>
    substring.language === Language.English && substring.gender === Gender.Masculine;
  const substrings: LocalizedSubstring[] = current.substrings.some(isEnglish)
    ? current.substrings.map((substring) => (isEnglish(substring) ? { ...substring, text } : substring))
    : [...current.substrings, { language: Language.English, gender: Gender.Masculine, text }];
  return { stringRef: current.stringRef, substrings };
}

function parseAsKind(current: GffValue, text: string): GffValue {
  switch (current.type) {
    case 'Byte':
    case 'Char':
    case 'Word':
    case 'Short':
    case 'DWord':
    case 'Int':
    case 'Float':
    case 'Double':
      return { type: current.type, value: parseNumber(text, current.type) };
    case 'DWord64':
    case 'Int64':
      return { type: current.type, value: parseBigInt(text, current.type) };
    case 'ExoString':
    case 'ResRef':
      return { type: current.type, value: text };
    case 'ExoLocString':
      return { type: 'ExoLocString', value: withEnglishText(current.value, text) };
    case 'Void':
      if (!/^([0-9a-fA-F]{2})*$/.test(text)) {
        throw new GffError(`"${text}" is not an even-length hex string`);
      }
      return { type: 'Void', value: Buffer.from(text, 'hex') };
    case 'Struct':
    case 'List':
      throw new GffError(`${current.type} fields cannot be set from text`);
  }
}

/**
 * Parses `text` as a new value of the same kind as `current`.
 *
 * Numbers accept anything `Number` does (so `0x10` works); 64-bit kinds take
 * `BigInt` syntax; Void takes hex; localized strings set their English text.
 *
 * @throws {GffError} If the text does not parse or does not fit the kind, or the kind is a Struct or List
 */
export function parseValueText(current: GffValue, text: string): GffValue {
  const value = parseAsKind(current, text);
  const problem = checkValueRange(value);
  if (problem !== undefined) {
    throw new GffError(problem);
  }
  return value;
}
