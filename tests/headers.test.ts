/**
 * Header attachment tests
 *
 * Creating vs. extending headers, and header vs. subheader levels.
 */

import { describe, it, expect } from 'vitest';
import { createTableBuilder } from '../packages/compiler/table-builder.js';
import { topLevelHeaders } from '../packages/compiler/headers.js';
import { cell, hasRole, type Header } from '../packages/compiler/cell.js';
import type { FormulaNode } from '../packages/parser/ast.js';

const ROW: FormulaNode = { type: 'identifier', name: 'age' };
const COL: FormulaNode = { type: 'identifier', name: 'drug' };

function fresh() {
  return createTableBuilder(ROW, COL);
}

describe('Header attachment', () => {
  it('stacks a subheader level under the first header', () => {
    const header = fresh().rowHeader(['Age']).rowHeader(['Years'], { sub: true }).table.rowHeader;

    expect(header).toEqual([
      { role: 'header', cells: [cell('Age', { row: ROW, col: COL, role: 'header' })] },
      { role: 'subheader', cells: [cell('Years', { row: ROW, col: COL, role: 'subheader' })] },
    ]);
  });

  it('treats later levels as subheaders by default', () => {
    const header = fresh().colHeader(['Placebo', 'Drug']).colHeader(['mean', 'sd']).table.colHeader;

    expect(header?.map(level => level.role)).toEqual(['header', 'subheader']);
  });

  it('makes the first header on an axis primary even when sub is requested', () => {
    const header = fresh().rowHeader(['Age'], { sub: true }).table.rowHeader;

    expect(header).toHaveLength(1);
    expect(header?.[0]?.role).toBe('header');
    expect(header?.[0]?.cells[0]?.role).toBe('header');
  });

  it('satisfies header handling with subheader cells', () => {
    const header = fresh().rowHeader(['Age']).rowHeader(['Years']).table.rowHeader;
    const years = header?.[1]?.cells[0];

    expect(years && hasRole(years, 'header')).toBe(true);
    expect(years && hasRole(years, 'subheader')).toBe(true);
    expect(years && hasRole(years, 'plain')).toBe(false);
  });

  it('adds a fresh top-level header alongside the first when sub is false', () => {
    const header = fresh()
      .rowHeader(['Age'], { sub: false })
      .rowHeader(['Age'], { sub: false })
      .table.rowHeader;

    expect(header?.map(level => level.role)).toEqual(['header', 'header']);
    expect(header && topLevelHeaders(header)).toHaveLength(2);
  });

  it('keeps row and column headers independent', () => {
    const table = fresh().colHeader(['Placebo', 'Drug']).rowHeader(['Age']).table;

    expect(table.colHeader).toHaveLength(1);
    expect(table.rowHeader).toHaveLength(1);
    expect(table.rowHeader?.[0]?.role).toBe('header');
  });

  it('flattens header elements', () => {
    const header = fresh().colHeader([['Placebo', 'Drug'], 'Total']).table.colHeader;

    expect(header?.[0]?.cells.map(c => c.value)).toEqual(['Placebo', 'Drug', 'Total']);
  });

  it('leaves the grid and cursor untouched', () => {
    const before = fresh().cursorPos(2, 3).writeCell('x');
    const after = before.colHeader(['a', 'b']);

    expect(after.table.rows).toBe(before.table.rows);
    expect([after.nrow, after.ncol]).toEqual([2, 3]);
    expect(before.table.colHeader).toBeUndefined();
  });
});

describe('topLevelHeaders', () => {
  it('groups each header level with the subheaders after it', () => {
    const level = (role: 'header' | 'subheader', value: string) => ({
      role,
      cells: [cell(value)],
    });
    const header: Header = [
      level('header', 'A'),
      level('subheader', 'B'),
      level('header', 'C'),
      level('subheader', 'D'),
    ];

    const groups = topLevelHeaders(header);

    expect(groups.map(group => group.map(l => l.cells[0]?.value))).toEqual([
      ['A', 'B'],
      ['C', 'D'],
    ]);
  });
});
