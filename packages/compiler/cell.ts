/**
 * Cells - The Values a Table Is Made Of
 *
 * A cell wraps a displayable value with the AST nodes it came from
 * (for traceability) and a role. Header roles form a small lattice:
 * a subheader is a header, so anything written against 'header'
 * must also accept 'subheader'.
 */

import type { FormulaNode } from '../parser/ast.js';

// ---
// CONTENTS
// ---

/**
 * A label with optional units, e.g. { text: "Weight", units: "kg" }.
 */
export interface LabelContent {
  readonly kind: 'label';
  readonly text: string;
  readonly units?: string;
}

/**
 * A count ("N") scalar, optionally named after what was counted.
 */
export interface CountContent {
  readonly kind: 'N';
  readonly n: number;
  readonly name?: string;
}

export type CellContent =
  | null
  | string
  | number
  | boolean
  | LabelContent
  | CountContent;

// ---
// ROLES
// ---

export type CellRole = 'plain' | 'header' | 'subheader';

/**
 * Roles each role satisfies (itself included).
 */
const SATISFIES: Record<CellRole, readonly CellRole[]> = {
  plain: ['plain'],
  header: ['header'],
  subheader: ['subheader', 'header'],
};

/**
 * Check whether a role satisfies a required role ('subheader' satisfies 'header').
 */
export function roleSatisfies(role: CellRole, required: CellRole): boolean {
  return SATISFIES[role].includes(required);
}

// ---
// CELLS
// ---

export interface Cell {
  readonly kind: 'cell';

  /** The displayable value */
  readonly value: CellContent;

  readonly role: CellRole;

  /** Row AST node this cell was produced for */
  readonly row?: FormulaNode;

  /** Column AST node this cell was produced for */
  readonly col?: FormulaNode;

  /** Sub element of the row node, for fine-grained traceability */
  readonly subrow?: number;

  /** Sub element of the column node, for fine-grained traceability */
  readonly subcol?: number;
}

/**
 * Traceability indices passed through writes.
 */
export interface CellTrace {
  readonly subrow?: number;
  readonly subcol?: number;
}

export interface CellAnchor extends CellTrace {
  readonly row?: FormulaNode;
  readonly col?: FormulaNode;
  readonly role?: CellRole;
}

/**
 * Anything that can be written into a table position.
 */
export type TableElement = CellContent | Cell;

export function isCell(element: TableElement): element is Cell {
  return typeof element === 'object' && element !== null && element.kind === 'cell';
}

export function isLabelContent(value: CellContent): value is LabelContent {
  return typeof value === 'object' && value !== null && value.kind === 'label';
}

export function isCountContent(value: CellContent): value is CountContent {
  return typeof value === 'object' && value !== null && value.kind === 'N';
}

/**
 * Wrap an element as a cell with the given provenance.
 *
 * An element that is already a cell keeps its value and role
 * (unless a role is given) and is re-anchored.
 */
export function cell(element: TableElement, anchor: CellAnchor = {}): Cell {
  const value = isCell(element) ? element.value : element;
  const role = anchor.role ?? (isCell(element) ? element.role : 'plain');

  return {
    kind: 'cell',
    value,
    role,
    ...(anchor.row !== undefined ? { row: anchor.row } : {}),
    ...(anchor.col !== undefined ? { col: anchor.col } : {}),
    ...(anchor.subrow !== undefined ? { subrow: anchor.subrow } : {}),
    ...(anchor.subcol !== undefined ? { subcol: anchor.subcol } : {}),
  };
}

/**
 * An empty cell with no provenance.
 */
export function blankCell(): Cell {
  return { kind: 'cell', value: null, role: 'plain' };
}

export function cellLabel(text: string, units?: string): LabelContent {
  return units === undefined ? { kind: 'label', text } : { kind: 'label', text, units };
}

export function cellCount(n: number, name?: string): CountContent {
  return name === undefined ? { kind: 'N', n } : { kind: 'N', n, name };
}

/**
 * Check whether a cell plays a role ('subheader' cells are also headers).
 */
export function hasRole(target: Cell, role: CellRole): boolean {
  return roleSatisfies(target.role, role);
}

// ---
// TABLES
// ---

/**
 * A header level: one ordered sequence of header cells on an axis.
 */
export interface HeaderLevel {
  readonly role: 'header' | 'subheader';
  readonly cells: readonly Cell[];
}

/**
 * Header levels attached to an axis, outermost first.
 */
export type Header = readonly HeaderLevel[];

/**
 * A grid of cells plus header metadata for each axis.
 */
export interface CellTable {
  readonly rows: readonly (readonly Cell[])[];
  readonly rowHeader?: Header;
  readonly colHeader?: Header;
}

/**
 * Create a table of blank cells.
 */
export function cellTable(nrow: number, ncol: number): CellTable {
  const rows: Cell[][] = [];
  for (let i = 0; i < nrow; i++) {
    const cells: Cell[] = [];
    for (let j = 0; j < ncol; j++) {
      cells.push(blankCell());
    }
    rows.push(cells);
  }
  return { rows };
}

// ---
// FORMATTING
// ---

/**
 * Format a cell value for display.
 */
export function formatCellContent(value: CellContent): string {
  if (value === null) return '';
  if (isLabelContent(value)) {
    return value.units === undefined ? value.text : `${value.text} (${value.units})`;
  }
  if (isCountContent(value)) {
    return `N=${value.n}`;
  }
  return String(value);
}

/**
 * Print a table for debugging.
 */
export function printTable(table: CellTable): string {
  const lines: string[] = [];
  lines.push('CellTable:');

  lines.push('\n  Row Header:');
  printHeader(table.rowHeader, '    ', lines);

  lines.push('\n  Column Header:');
  printHeader(table.colHeader, '    ', lines);

  lines.push('\n  Rows:');
  table.rows.forEach((cells, i) => {
    const values = cells.map(c => JSON.stringify(formatCellContent(c.value)));
    lines.push(`    [${i + 1}] ${values.join(' | ')}`);
  });

  return lines.join('\n');
}

/**
 * Print a header's levels, one per line.
 */
export function printHeader(header: Header | undefined, indent: string, lines: string[]): void {
  if (!header) {
    lines.push(`${indent}(none)`);
    return;
  }
  header.forEach((level, i) => {
    const values = level.cells.map(c => JSON.stringify(formatCellContent(c.value)));
    lines.push(`${indent}${i + 1}. ${level.role}: ${values.join(', ')}`);
  });
}
