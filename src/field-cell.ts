/**
 * Shared, in-place-mutable field slots of the resolved tree.
 *
 * A cell is reachable from its parent struct and may be held at the same time
 * by any number of editors (`FieldRef`s, traversal results). All holders
 * reference the same object, so a write through one is seen by the others.
 * Reads and writes run on the event loop and never interleave.
 */
import { expectField, fieldTypeOf, type FieldAccessor, type GffValue, type ValueOf } from './field-value.js';
import type { FieldType, FieldTypeName } from './types/field-type.js';

export class FieldCell {
  private currentLabel: string;
  private currentValue: GffValue;
  private revisionCount: number = 0;

  constructor(label: string, value: GffValue) {
    this.currentLabel = label;
    this.currentValue = value;
  }

  get label(): string {
    return this.currentLabel;
  }

  get value(): GffValue {
    return this.currentValue;
  }

  get fieldType(): FieldType {
    return fieldTypeOf(this.currentValue);
  }

  /** Incremented on every write, so holders can tell whether the cell changed. */
  get revision(): number {
    return this.revisionCount;
  }

  hasLabel(label: string): boolean {
    return this.currentLabel === label;
  }

  set(value: GffValue): void {
    this.currentValue = value;
    this.revisionCount += 1;
  }

  update(change: (value: GffValue) => GffValue): void {
    this.set(change(this.currentValue));
  }

  rename(label: string): void {
    this.currentLabel = label;
    this.revisionCount += 1;
  }

  /**
   * @throws {GffFieldTypeError} If the cell holds another kind
   */
  expect<K extends FieldTypeName>(type: K): ValueOf<K> {
    return expectField(this.currentValue, type);
  }
}

/**
 * Typed view of one cell, e.g. `new FieldRef(cell, FieldAccessors.Word)`.
 * Every read goes to the cell, so the view never goes stale.
 */
export class FieldRef<T> {
  readonly cell: FieldCell;
  private readonly accessor: FieldAccessor<T>;

  /**
   * @throws {GffFieldTypeError} If the cell does not hold the accessor's kind
   */
  constructor(cell: FieldCell, accessor: FieldAccessor<T>) {
    this.cell = cell;
    this.accessor = accessor;
    accessor.read(cell.value);
  }

  get label(): string {
    return this.cell.label;
  }

  get(): T {
    return this.accessor.read(this.cell.value);
  }

  set(value: T): void {
    this.cell.set(this.accessor.write(value));
  }

  modify(change: (value: T) => T): void {
    this.set(change(this.get()));
  }
}
