/**
 * table compiler - walks a two-sided formula and lays out one block per
 * (row term, column term) pair
 *
 * columns come from the left of `~`, rows from the right. Each row term gets
 * a band starting at the first unused row; within a band, column blocks are
 * placed left to right, never left of where the same column term started in
 * an earlier band. The emitter writes its block at or past the cursor it is
 * handed, so it never needs absolute coordinates.
 *
 * Term labels become one header level per axis, each label sitting at the
 * first row (or column) of its band (or block).
 */

import {
  isTwoSided,
  printFormula,
  terms,
  type FormulaNode,
} from '../parser/ast.js';
import type { LabelContent, TableElement } from './cell.js';
import { deriveLabel } from './label.js';
import { TableBuilder } from './table-builder.js';

/**
 * Writes the block for one (row term, column term) pair, starting at the
 * builder's cursor.
 */
export type CellEmitter = (
  builder: TableBuilder,
  row: FormulaNode,
  col: FormulaNode
) => TableBuilder;

export interface TableCompileOptions {
  /** Attach the row and column term labels as primary headers (default: true) */
  headers?: boolean;
}

/**
 * Compile a formula into a table.
 *
 * @param formula - A two-sided formula, e.g. `drug ~ age + sex`
 * @param emit - Writes the cells for each (row term, column term) pair
 * @returns The final builder; its `table` is the finished table
 */
export function compileTable(
  formula: FormulaNode,
  emit: CellEmitter,
  options: TableCompileOptions = {}
): TableBuilder {
  const { headers = true } = options;

  if (!isTwoSided(formula)) {
    throw new Error(`compileTable expects a two-sided formula (lhs ~ rhs), got: ${printFormula(formula)}`);
  }

  const rowTerms = terms(formula.right);
  const colTerms = terms(formula.left);

  // first grid row of each row term's band, first grid column of each column
  // term's block; undefined while nothing has been written for the term
  const rowStarts = rowTerms.map((): number | undefined => undefined);
  const colStarts = colTerms.map((): number | undefined => undefined);

  let builder = TableBuilder.create(formula.right, formula.left);

  let top = 1;
  rowTerms.forEach((rowTerm, i) => {
    let bottom = top - 1;
    let right = 0;

    colTerms.forEach((colTerm, j) => {
      const left = Math.max(colStarts[j] ?? 1, right + 1);
      const before = builder;
      builder = emit(builder.cursorPos(top, left), rowTerm, colTerm);

      // an empty block takes no space
      const extent = writtenExtent(before, builder, top);
      if (extent === undefined) return;

      colStarts[j] = left;
      right = Math.max(right, extent.right);
      bottom = Math.max(bottom, extent.bottom);
    });

    if (bottom >= top) {
      rowStarts[i] = top;
      top = bottom + 1;
    }
  });

  if (!headers) {
    return builder;
  }

  return builder
    .colHeader([headerLevel(colTerms.map(termLabel), colStarts, gridWidth(builder))])
    .rowHeader([headerLevel(rowTerms.map(termLabel), rowStarts, builder.rowCount)]);
}

/**
 * Label of a term. Terms without a label of their own are named by their
 * source text (`sex * age`, `log(dose)`).
 */
function termLabel(term: FormulaNode): LabelContent {
  return deriveLabel({ name: printFormula(term), data: term.data });
}

interface Extent {
  /** Last row written (1-based) */
  readonly bottom: number;
  /** Last column written (1-based) */
  readonly right: number;
}

/**
 * Bounds of the cells written between two builders, from row `top` down.
 * Writes always produce new cell objects, so identity tells them apart from
 * cells carried over.
 */
function writtenExtent(before: TableBuilder, after: TableBuilder, top: number): Extent | undefined {
  let extent: Extent | undefined;
  for (let row = top; row <= after.rowCount; row++) {
    for (let col = 1; col <= after.width(row); col++) {
      if (after.cellAt(row, col) !== before.cellAt(row, col)) {
        extent = { bottom: row, right: Math.max(extent?.right ?? 0, col) };
      }
    }
  }
  return extent;
}

function gridWidth(builder: TableBuilder): number {
  let width = 0;
  for (let row = 1; row <= builder.rowCount; row++) {
    width = Math.max(width, builder.width(row));
  }
  return width;
}

/**
 * One header cell per grid position: each label at its term's first row or
 * column, blanks elsewhere. Terms that wrote nothing get no cell.
 */
function headerLevel(
  labels: readonly LabelContent[],
  starts: readonly (number | undefined)[],
  length: number
): TableElement[] {
  const level = new Array<TableElement>(length).fill(null);
  starts.forEach((start, i) => {
    const label = labels[i];
    if (start !== undefined && label !== undefined) {
      level[start - 1] = label;
    }
  });
  return level;
}
