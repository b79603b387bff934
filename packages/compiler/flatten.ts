/**
 * element flattening - resolves "one or many table elements" arguments into
 * one entry per logical cell
 */

import { cellCount, type TableElement } from './cell.js';

/**
 * A vector of counts. Each value becomes its own "N" cell,
 * carrying the vector's name.
 */
export interface CountVector {
  readonly kind: 'N-vector';
  readonly values: readonly number[];
  readonly name?: string;
}

/**
 * One argument to a bulk write:
 * - a single element (one entry)
 * - an ordered sequence (one entry per item, flattened one level)
 * - a count vector (one "N" entry per value)
 */
export type TableElements =
  | TableElement
  | readonly TableElement[]
  | CountVector;

export function counts(values: readonly number[], name?: string): CountVector {
  return name === undefined ? { kind: 'N-vector', values } : { kind: 'N-vector', values, name };
}

/**
 * Inclusive integer range, e.g. range(4, 6) gives [4, 5, 6].
 */
export function range(from: number, to: number): number[] {
  const result: number[] = [];
  for (let i = from; i <= to; i++) {
    result.push(i);
  }
  return result;
}

function isSequence(elements: TableElements): elements is readonly TableElement[] {
  return Array.isArray(elements);
}

function isCountVector(elements: TableElements): elements is CountVector {
  return (
    !isSequence(elements) &&
    typeof elements === 'object' &&
    elements !== null &&
    elements.kind === 'N-vector'
  );
}

/**
 * Flatten bulk-write arguments, in source order.
 *
 * flattenElements(null, [1, 2, 3], range(4, 6), [7, 8, 9]) has 10 entries.
 * An empty sequence contributes nothing.
 */
export function flattenElements(...args: TableElements[]): TableElement[] {
  const flat: TableElement[] = [];

  for (const arg of args) {
    if (isSequence(arg)) {
      flat.push(...arg);
    } else if (isCountVector(arg)) {
      for (const n of arg.values) {
        flat.push(cellCount(n, arg.name));
      }
    } else {
      flat.push(arg);
    }
  }

  return flat;
}
