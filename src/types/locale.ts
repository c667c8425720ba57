/**
 * Language and gender of a localized substring.
 */

export enum Language {
  English = 0,
  French = 1,
  German = 2,
  Italian = 3,
  Spanish = 4,
  Polish = 5,
  Korean = 128,
  ChineseTraditional = 129,
  ChineseSimplified = 130,
  Japanese = 131,
}

export enum Gender {
  Masculine = 0,
  Feminine = 1,
}

const LANGUAGES: ReadonlySet<number> = new Set(
  Object.values(Language).filter((value): value is Language => typeof value === 'number')
);

export function isLanguage(value: number): value is Language {
  return LANGUAGES.has(value);
}

/** Wire form of a (language, gender) pair. */
export function packStringId(language: Language, gender: Gender): number {
  return language * 2 + gender;
}

export function unpackStringId(stringId: number): { readonly language: number; readonly gender: Gender } {
  const gender: Gender = (stringId & 1) === 1 ? Gender.Feminine : Gender.Masculine;
  return { language: stringId >>> 1, gender };
}
