/**
 * String-table lookup used to display localized strings.
 *
 * The talk-table file reader lives outside this project; anything that can
 * map a reference to text can be plugged in here.
 */
import { readFile } from 'node:fs/promises';
import { NO_STRING_REF } from './constants/gff-layout.js';
import { describeError, GffError, GffLookupError } from './errors.js';

export interface StringResolver {
  /**
   * @throws {GffLookupError} If the reference is unknown
   */
  resolve(stringRef: number): string;
}

/**
 * Resolver backed by an in-memory table.
 */
export class MapStringResolver implements StringResolver {
  private readonly entries: Map<number, string>;

  constructor(entries: Iterable<readonly [number, string]> = []) {
    this.entries = new Map(entries);
  }

  /**
   * Builds a resolver from a JSON object mapping decimal references to text.
   * @throws {GffError} If the JSON has another shape
   */
  static fromJson(json: unknown): MapStringResolver {
    if (typeof json !== 'object' || json === null || Array.isArray(json)) {
      throw new GffError('String table must be a JSON object of reference -> text');
    }
    const entries: [number, string][] = [];
    for (const [key, text] of Object.entries(json)) {
      const stringRef = Number(key);
      if (!/^\d+$/.test(key) || stringRef > 0xffffffff) {
        throw new GffError(`String table key "${key}" is not a 32-bit string reference`);
      }
      if (typeof text !== 'string') {
        throw new GffError(`String table entry ${key} is not a string`);
      }
      entries.push([stringRef, text]);
    }
    return new MapStringResolver(entries);
  }

  static async fromFile({ filePath }: { readonly filePath: string }): Promise<MapStringResolver> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(filePath, 'utf8'));
    } catch (error) {
      throw new GffError(`Failed to load string table "${filePath}": ${describeError(error)}`, error);
    }
    return MapStringResolver.fromJson(parsed);
  }

  get size(): number {
    return this.entries.size;
  }

  resolve(stringRef: number): string {
    if (stringRef === NO_STRING_REF) {
      return '';
    }
    const text = this.entries.get(stringRef);
    if (text === undefined) {
      throw new GffLookupError(stringRef);
    }
    return text;
  }
}

/**
 * Memoizes another resolver. Failed lookups are not cached.
 */
export class CachingStringResolver implements StringResolver {
  private readonly cache = new Map<number, string>();

  constructor(private readonly inner: StringResolver) {}

  get cachedCount(): number {
    return this.cache.size;
  }

  resolve(stringRef: number): string {
    const cached = this.cache.get(stringRef);
    if (cached !== undefined) {
      return cached;
    }
    const text = this.inner.resolve(stringRef);
    this.cache.set(stringRef, text);
    return text;
  }
}
