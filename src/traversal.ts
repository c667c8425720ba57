/**
 * Breadth- and depth-first walks over the live tree.
 *
 * Every cell is yielded, containers included; a Struct or List cell is
 * expanded after it has been yielded, from the value it holds at that moment.
 * Each call returns a new generator, so a walk can be restarted at any time.
 */
import type { FieldCell } from './field-cell.js';
import type { GffValue } from './field-value.js';
import type { GffStruct } from './gff-struct.js';

export type TraversalOrder = 'bfs' | 'dfs';

function childCells(value: GffValue): FieldCell[] {
  switch (value.type) {
    case 'Struct':
      return [...value.value.fields];
    case 'List':
      return value.value.flatMap((struct: GffStruct) => struct.fields);
    default:
      return [];
  }
}

export function* breadthFirst(root: GffStruct): Generator<FieldCell, void, undefined> {
  const queue: FieldCell[] = [...root.fields];
  for (let index = 0; index < queue.length; index++) {
    const cell = queue[index];
    yield cell;
    queue.push(...childCells(cell.value));
  }
}

export function* depthFirst(root: GffStruct): Generator<FieldCell, void, undefined> {
  const stack: FieldCell[] = [...root.fields].reverse();
  for (let cell = stack.pop(); cell !== undefined; cell = stack.pop()) {
    yield cell;
    stack.push(...childCells(cell.value).reverse());
  }
}

export function traverse(root: GffStruct, order: TraversalOrder): Generator<FieldCell, void, undefined> {
  return order === 'bfs' ? breadthFirst(root) : depthFirst(root);
}
