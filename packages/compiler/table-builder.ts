/**
 * Table Builder - Cursor-Addressed Table Construction
 *
 * A table is built cell by cell at a cursor position, loosely modeled on a
 * VT100 terminal: absolute and relative cursor motion, carriage return and
 * line feed, single-cell writes, and row/column-wise bulk writes.
 *
 * Builders are immutable. Every operation returns a new builder, so a
 * construction reads as a chain:
 *
 * @example
 * ```typescript
 * const table = createTableBuilder(formula.right, formula.left)
 *   .colHeader(['Placebo', 'Treatment'])
 *   .addCol(['Age', 54.2, 55.1])
 *   .newLine()
 *   .addCol(['Weight', 71.5, 70.9])
 *   .table;
 * ```
 *
 * The builder also keeps references to the row and column AST nodes it was
 * created for. Every cell written is anchored to them, so indexes and
 * tracebacks can be generated from the finished table.
 */

import type { FormulaNode } from '../parser/ast.js';
import {
  blankCell,
  cell,
  cellTable,
  type Cell,
  type CellTable,
  type CellTrace,
  type TableElement,
} from './cell.js';
import { CursorBoundsError } from './errors.js';
import { flattenElements, type TableElements } from './flatten.js';
import { appendHeader, getHeader, headerRole, setHeader, type HeaderAxis } from './headers.js';

export interface HeaderOptions {
  /**
   * Treat the new level as a subheader of the existing header (default: true).
   * Ignored for the first header on an axis, which is always primary.
   * When false, the level starts a new top-level header.
   */
  sub?: boolean;
}

export class TableBuilder {
  private constructor(
    /** The table under construction, with its header metadata */
    readonly table: CellTable,
    /** Cursor row (1-based) */
    readonly nrow: number,
    /** Cursor column (1-based) */
    readonly ncol: number,
    /** Row AST node anchoring this table */
    readonly row: FormulaNode,
    /** Column AST node anchoring this table */
    readonly col: FormulaNode
  ) {}

  /** An empty builder: one blank cell, cursor at (1,1) */
  static create(row: FormulaNode, col: FormulaNode): TableBuilder {
    return new TableBuilder(cellTable(1, 1), 1, 1, row, col);
  }

  // ---
  // READING
  // ---

  /** Number of rows in the grid */
  get rowCount(): number {
    return this.table.rows.length;
  }

  /** Number of cells in a row (1-based), 0 past the last row */
  width(row: number = 1): number {
    return this.table.rows[row - 1]?.length ?? 0;
  }

  cellAt(row: number, col: number): Cell | undefined {
    return this.table.rows[row - 1]?.[col - 1];
  }

  // ---
  // CURSOR MOVEMENT
  // ---

  /** Cursor to (1,1) */
  home(): TableBuilder {
    return this.moveTo('home', 1, 1);
  }

  cursorUp(n: number = 1): TableBuilder {
    assertCount('cursorUp', n);
    return this.moveTo('cursorUp', this.nrow - n, this.ncol);
  }

  cursorDown(n: number = 1): TableBuilder {
    assertCount('cursorDown', n);
    return this.moveTo('cursorDown', this.nrow + n, this.ncol);
  }

  cursorLeft(n: number = 1): TableBuilder {
    assertCount('cursorLeft', n);
    return this.moveTo('cursorLeft', this.nrow, this.ncol - n);
  }

  cursorRight(n: number = 1): TableBuilder {
    assertCount('cursorRight', n);
    return this.moveTo('cursorRight', this.nrow, this.ncol + n);
  }

  /** Cursor to an absolute position */
  cursorPos(nrow: number, ncol: number): TableBuilder {
    assertCount('cursorPos', nrow);
    assertCount('cursorPos', ncol);
    return this.moveTo('cursorPos', nrow, ncol);
  }

  /** Cursor to the first column, same row */
  carriageReturn(): TableBuilder {
    return this.moveTo('carriageReturn', this.nrow, 1);
  }

  /** Cursor down n rows, same column */
  lineFeed(n: number = 1): TableBuilder {
    return this.cursorDown(n);
  }

  /** First column of the next row */
  newLine(): TableBuilder {
    return this.carriageReturn().lineFeed();
  }

  /** First column of the first unused row */
  newRow(): TableBuilder {
    return this.home().cursorDown(this.rowCount);
  }

  /** First row, column past the last used column of row 1 */
  newCol(): TableBuilder {
    return this.home().cursorRight(this.width(1));
  }

  // ---
  // WRITING
  // ---

  /**
   * Write a single element at the cursor, overwriting what is there.
   *
   * Missing rows are appended up to the cursor row, and the cursor row is
   * padded with blank cells up to the cursor column. The cursor does not move.
   */
  writeCell(element: TableElement, trace: CellTrace = {}): TableBuilder {
    const rows = [...this.table.rows];
    while (rows.length < this.nrow) {
      rows.push([]);
    }

    const target = [...(rows[this.nrow - 1] ?? [])];
    while (target.length < this.ncol) {
      target.push(blankCell());
    }
    target[this.ncol - 1] = cell(element, {
      row: this.row,
      col: this.col,
      subrow: trace.subrow,
      subcol: trace.subcol,
    });
    rows[this.nrow - 1] = target;

    return this.withTable({ ...this.table, rows });
  }

  /** Write each element, moving right after each one */
  addCol(elements: readonly TableElements[], trace: CellTrace = {}): TableBuilder {
    return this.apply(flattenElements(...elements), (builder, element) =>
      builder.writeCell(element, trace).cursorRight()
    );
  }

  /** Write each element, moving down after each one */
  addRow(elements: readonly TableElements[], trace: CellTrace = {}): TableBuilder {
    return this.apply(flattenElements(...elements), (builder, element) =>
      builder.writeCell(element, trace).cursorDown()
    );
  }

  /**
   * Thread the builder through fn once per item, left to right.
   */
  apply<T>(
    items: readonly T[],
    fn: (builder: TableBuilder, item: T, index: number) => TableBuilder
  ): TableBuilder {
    return items.reduce<TableBuilder>((builder, item, index) => fn(builder, item, index), this);
  }

  // ---
  // HEADERS
  // ---

  /**
   * Attach a header level to an axis.
   *
   * Creates the axis header if there is none, otherwise appends a level to
   * it. The grid and cursor are untouched.
   */
  attachHeader(axis: HeaderAxis, elements: readonly TableElements[], sub: boolean): TableBuilder {
    const existing = getHeader(this.table, axis);
    const role = headerRole(existing, sub);

    const cells = flattenElements(...elements).map(element =>
      cell(element, { row: this.row, col: this.col, role })
    );

    return this.withTable(setHeader(this.table, axis, appendHeader(existing, cells, sub)));
  }

  rowHeader(elements: readonly TableElements[], options: HeaderOptions = {}): TableBuilder {
    const { sub = true } = options;
    return this.attachHeader('row', elements, sub);
  }

  colHeader(elements: readonly TableElements[], options: HeaderOptions = {}): TableBuilder {
    const { sub = true } = options;
    return this.attachHeader('col', elements, sub);
  }

  // ---
  // INTERNALS
  // ---

  private moveTo(operation: string, nrow: number, ncol: number): TableBuilder {
    if (nrow <= 0 || ncol <= 0) {
      throw new CursorBoundsError(operation, nrow, ncol);
    }
    return new TableBuilder(this.table, nrow, ncol, this.row, this.col);
  }

  private withTable(table: CellTable): TableBuilder {
    return new TableBuilder(table, this.nrow, this.ncol, this.row, this.col);
  }
}

function assertCount(operation: string, n: number): void {
  if (!Number.isInteger(n)) {
    throw new TypeError(`${operation} expects an integer, got ${n}`);
  }
}

/**
 * Create an empty table builder anchored to a row and column AST node.
 */
export function createTableBuilder(row: FormulaNode, col: FormulaNode): TableBuilder {
  return TableBuilder.create(row, col);
}
