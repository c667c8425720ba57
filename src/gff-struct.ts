/**
 * Resolved struct: an id and an ordered list of shared field cells.
 */
import { FieldCell } from './field-cell.js';
import type { GffValue } from './field-value.js';
import { traverse, type TraversalOrder } from './traversal.js';

/**
 * Where a struct came from. Empty structs read from a file echo their original
 * `dataOrOffset` when written back; synthesized ones have none.
 */
export type StructOrigin =
  | { readonly kind: 'file'; readonly dataOrOffset: number }
  | { readonly kind: 'synthesized' };

export const SYNTHESIZED: StructOrigin = { kind: 'synthesized' };

export class GffStruct {
  id: number;
  readonly fields: FieldCell[];
  readonly origin: StructOrigin;

  constructor(id: number, fields: FieldCell[] = [], origin: StructOrigin = SYNTHESIZED) {
    this.id = id;
    this.fields = fields;
    this.origin = origin;
  }

  /**
   * Builds a synthesized struct from label/value pairs, in order.
   */
  static from(id: number, entries: Iterable<readonly [string, GffValue]>): GffStruct {
    const fields: FieldCell[] = [];
    for (const [label, value] of entries) {
      fields.push(new FieldCell(label, value));
    }
    return new GffStruct(id, fields);
  }

  get fieldCount(): number {
    return this.fields.length;
  }

  get(index: number): FieldCell | undefined {
    return this.fields[index];
  }

  /** First direct field with this label. */
  find(label: string): FieldCell | undefined {
    return this.fields.find((cell: FieldCell) => cell.hasLabel(label));
  }

  findAll(label: string): FieldCell[] {
    return this.fields.filter((cell: FieldCell) => cell.hasLabel(label));
  }

  add(label: string, value: GffValue): FieldCell {
    const cell = new FieldCell(label, value);
    this.fields.push(cell);
    return cell;
  }

  /**
   * Removes a field by cell identity, or the first field with a label.
   * @returns Whether a field was removed
   */
  remove(target: FieldCell | string): boolean {
    const index: number = typeof target === 'string'
      ? this.fields.findIndex((cell: FieldCell) => cell.hasLabel(target))
      : this.fields.indexOf(target);
    if (index === -1) {
      return false;
    }
    this.fields.splice(index, 1);
    return true;
  }

  bfs(): Generator<FieldCell, void, undefined> {
    return traverse(this, 'bfs');
  }

  dfs(): Generator<FieldCell, void, undefined> {
    return traverse(this, 'dfs');
  }

  /** First field anywhere below this struct with the given label. */
  findLabel(label: string, order: TraversalOrder = 'bfs'): FieldCell | undefined {
    for (const cell of traverse(this, order)) {
      if (cell.hasLabel(label)) {
        return cell;
      }
    }
    return undefined;
  }
}
