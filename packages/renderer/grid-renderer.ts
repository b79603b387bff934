/**
 * Grid Renderer
 *
 * Renders a finished CellTable to HTML.
 *
 * Column header levels become <thead> rows, outermost first. Row header
 * levels become leading <th> cells of each body row. Subheader cells are
 * rendered as headers with an extra class.
 */

import {
  formatCellContent,
  hasRole,
  type Cell,
  type CellTable,
  type Header,
} from '../compiler/cell.js';
import { printFormula } from '../parser/ast.js';

// ---
// MAIN RENDER FUNCTION
// ---

export interface GridRenderOptions {
  /** CSS class for the table */
  tableClass?: string;
  /** Whether to add data-trace attributes naming each cell's AST nodes */
  showTrace?: boolean;
}

/**
 * Render a CellTable to HTML.
 */
export function renderTableToHTML(
  table: CellTable,
  options: GridRenderOptions = {}
): string {
  const {
    tableClass = 'cursor-table',
    showTrace = true,
  } = options;

  const lines: string[] = [];
  lines.push(`<table class="${escapeHTML(tableClass)}">`);

  renderColumnHeaders(table, lines);
  renderBody(table, lines, showTrace);

  lines.push('</table>');
  return lines.join('\n');
}

// ---
// COLUMN HEADERS
// ---

function renderColumnHeaders(table: CellTable, lines: string[]): void {
  const colHeader = table.colHeader;
  if (!colHeader || colHeader.length === 0) return;

  const corners = levelCount(table.rowHeader);

  lines.push('<thead>');
  for (const level of colHeader) {
    const cells: string[] = [];
    for (let i = 0; i < corners; i++) {
      cells.push('<th class="corner"></th>');
    }
    for (const headerCell of level.cells) {
      cells.push(renderHeaderCell(headerCell));
    }
    lines.push(`<tr>${cells.join('')}</tr>`);
  }
  lines.push('</thead>');
}

// ---
// BODY
// ---

function renderBody(table: CellTable, lines: string[], showTrace: boolean): void {
  const rowHeader = table.rowHeader ?? [];

  lines.push('<tbody>');
  table.rows.forEach((cells, i) => {
    const rendered: string[] = [];

    // one leading header cell per row header level
    for (const level of rowHeader) {
      const headerCell = level.cells[i];
      rendered.push(headerCell ? renderHeaderCell(headerCell) : '<th></th>');
    }

    for (const dataCell of cells) {
      rendered.push(renderDataCell(dataCell, showTrace));
    }

    lines.push(`<tr>${rendered.join('')}</tr>`);
  });
  lines.push('</tbody>');
}

function renderHeaderCell(headerCell: Cell): string {
  // a subheader is handled as a header, with an extra class
  const classes = hasRole(headerCell, 'subheader') ? 'header subheader' : 'header';
  return `<th class="${classes}">${escapeHTML(formatCellContent(headerCell.value))}</th>`;
}

function renderDataCell(dataCell: Cell, showTrace: boolean): string {
  const trace = showTrace ? traceAttribute(dataCell) : '';
  const text = escapeHTML(formatCellContent(dataCell.value));
  if (hasRole(dataCell, 'header')) {
    return `<th class="header"${trace}>${text}</th>`;
  }
  return `<td${trace}>${text}</td>`;
}

/**
 * Traceability attribute: "row=age|col=drug|subrow=2"
 */
function traceAttribute(target: Cell): string {
  const parts: string[] = [];
  if (target.row) parts.push(`row=${printFormula(target.row)}`);
  if (target.col) parts.push(`col=${printFormula(target.col)}`);
  if (target.subrow !== undefined) parts.push(`subrow=${target.subrow}`);
  if (target.subcol !== undefined) parts.push(`subcol=${target.subcol}`);

  return parts.length > 0 ? ` data-trace="${escapeHTML(parts.join('|'))}"` : '';
}

// ---
// UTILITIES
// ---

function levelCount(header: Header | undefined): number {
  return header?.length ?? 0;
}

/**
 * Escape HTML special characters.
 */
function escapeHTML(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
