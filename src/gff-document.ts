/**
 * A GFF file as an editable tree: header tags plus the root struct.
 */
import { readFile } from 'node:fs/promises';
import { describeError, GffError } from './errors.js';
import type { FieldCell } from './field-cell.js';
import { GffBinary } from './gff-binary.js';
import { buildStructure } from './gff-builder.js';
import { resolveStructure } from './gff-resolver.js';
import { GffStruct } from './gff-struct.js';
import type { StringResolver } from './string-resolver.js';
import type { TraversalOrder } from './traversal.js';
import type { GffBinaryStructure } from './types/gff-binary-structure.js';

/** Type id the game gives every top-level struct. */
export const ROOT_STRUCT_ID = 0xffffffff;

export const DEFAULT_FILE_VERSION = 'V3.2';

export interface ReadOptions {
  /** Used to look up localized strings; without one no lookups happen. */
  readonly resolver?: StringResolver;
}

export class GffDocument {
  fileType: string;
  fileVersion: string;
  readonly root: GffStruct;

  constructor(fileType: string, fileVersion: string, root: GffStruct) {
    this.fileType = fileType;
    this.fileVersion = fileVersion;
    this.root = root;
  }

  /**
   * Starts an empty document, e.g. `GffDocument.create('IFO ')`.
   */
  static create(fileType: string, fileVersion: string = DEFAULT_FILE_VERSION): GffDocument {
    return new GffDocument(fileType, fileVersion, new GffStruct(ROOT_STRUCT_ID));
  }

  static fromStructure(structure: GffBinaryStructure, { resolver }: ReadOptions = {}): GffDocument {
    const root = resolveStructure(structure, resolver);
    return new GffDocument(structure.header.fileType, structure.header.fileVersion, root);
  }

  /**
   * Parses and resolves GFF bytes.
   *
   * @throws {GffParseError} If the data is truncated or malformed
   * @throws {GffAlignmentError} If an index-array offset is misaligned
   * @throws {GffLookupError} If the resolver does not know a string reference
   */
  static read(bytes: Uint8Array, options: ReadOptions = {}): GffDocument {
    const buffer = Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return GffDocument.fromStructure(GffBinary.parse(buffer), options);
  }

  /**
   * Reads a GFF file from disk.
   * @throws {GffError} If the file cannot be read, plus everything `read` throws
   */
  static async readFile({ filePath, resolver }: { readonly filePath: string } & ReadOptions): Promise<GffDocument> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      throw new GffError(`Failed to read "${filePath}": ${describeError(error)}`, error);
    }
    return GffDocument.read(buffer, { resolver });
  }

  /** Fresh binary records for the tree as it is now. */
  toStructure(): GffBinaryStructure {
    return buildStructure({ fileType: this.fileType, fileVersion: this.fileVersion, root: this.root });
  }

  /**
   * @throws {GffWriteError} If a value, label or tag cannot be encoded
   */
  write(): Buffer {
    return GffBinary.serialize(this.toStructure());
  }

  /**
   * @throws {GffWriteError} If encoding or writing fails
   */
  async writeFile({ outputPath }: { readonly outputPath: string }): Promise<void> {
    await GffBinary.write({ structure: this.toStructure(), outputPath });
  }

  bfs(): Generator<FieldCell, void, undefined> {
    return this.root.bfs();
  }

  dfs(): Generator<FieldCell, void, undefined> {
    return this.root.dfs();
  }

  findLabel(label: string, order: TraversalOrder = 'bfs'): FieldCell | undefined {
    return this.root.findLabel(label, order);
  }
}
