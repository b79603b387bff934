/**
 * Table Builder Tests
 *
 * Cursor movement, single-cell writes and row/column-wise bulk writes.
 */

import { describe, it, expect } from 'vitest';
import {
  TableBuilder,
  createTableBuilder,
} from '../packages/compiler/table-builder.js';
import { CursorBoundsError } from '../packages/compiler/errors.js';
import { blankCell, cellCount } from '../packages/compiler/cell.js';
import { counts } from '../packages/compiler/flatten.js';
import type { FormulaNode } from '../packages/parser/ast.js';

const ROW: FormulaNode = { type: 'identifier', name: 'age' };
const COL: FormulaNode = { type: 'identifier', name: 'drug' };

function fresh(): TableBuilder {
  return createTableBuilder(ROW, COL);
}

function values(builder: TableBuilder) {
  return builder.table.rows.map(row => row.map(c => c.value));
}

describe('Table Builder', () => {
  describe('Creation', () => {
    it('starts with one blank cell and the cursor at (1,1)', () => {
      const builder = fresh();

      expect(builder.nrow).toBe(1);
      expect(builder.ncol).toBe(1);
      expect(builder.rowCount).toBe(1);
      expect(builder.width(1)).toBe(1);
      expect(builder.cellAt(1, 1)).toEqual(blankCell());
    });

    it('keeps the anchoring AST nodes', () => {
      const builder = TableBuilder.create(ROW, COL);

      expect(builder.row).toBe(ROW);
      expect(builder.col).toBe(COL);
      expect(builder.table.rowHeader).toBeUndefined();
      expect(builder.table.colHeader).toBeUndefined();
    });
  });

  describe('Cursor movement', () => {
    it.each([
      [1, 1],
      [3, 7],
      [10, 2],
    ])('cursorPos(%i, %i) moves to that position', (r, c) => {
      const builder = fresh().cursorPos(r, c);
      expect(builder.nrow).toBe(r);
      expect(builder.ncol).toBe(c);
    });

    it('rejects non-positive absolute positions', () => {
      expect(() => fresh().cursorPos(0, 3)).toThrow(CursorBoundsError);
      expect(() => fresh().cursorPos(3, 0)).toThrow(CursorBoundsError);
      expect(() => fresh().cursorPos(-2, 4)).toThrow(CursorBoundsError);
    });

    it('homes from anywhere', () => {
      const builder = fresh().cursorPos(5, 4).home();
      expect([builder.nrow, builder.ncol]).toEqual([1, 1]);
    });

    it('moves relative to the current position', () => {
      const builder = fresh().cursorPos(3, 3);

      expect(builder.cursorUp(2).nrow).toBe(1);
      expect(builder.cursorDown(2).nrow).toBe(5);
      expect(builder.cursorLeft(2).ncol).toBe(1);
      expect(builder.cursorRight(2).ncol).toBe(5);
      expect(builder.cursorDown().nrow).toBe(4);
    });

    it('returns to the same column after right then left', () => {
      const start = fresh().cursorPos(2, 3);
      for (let n = 1; n <= 5; n++) {
        expect(start.cursorRight(n).cursorLeft(n).ncol).toBe(3);
      }
    });

    it('fails when moving up past the first row', () => {
      expect(() => fresh().cursorUp()).toThrow(
        'cursorUp beyond available cells (row 0, col 1)'
      );
    });

    it('fails when moving left past the first column', () => {
      const error = (() => {
        try {
          fresh().cursorPos(2, 2).cursorLeft(3);
        } catch (e) {
          return e;
        }
        return null;
      })();

      expect(error).toBeInstanceOf(CursorBoundsError);
      expect(error).toMatchObject({ operation: 'cursorLeft', nrow: 2, ncol: -1 });
    });

    it('fails on negative down and right moves that leave the grid', () => {
      expect(() => fresh().cursorDown(-1)).toThrow(CursorBoundsError);
      expect(() => fresh().cursorPos(1, 2).cursorRight(-3)).toThrow(CursorBoundsError);
    });

    it('rejects fractional move counts', () => {
      expect(() => fresh().cursorDown(1.5)).toThrow(TypeError);
    });

    it('carriage return goes to the first column of the same row', () => {
      const builder = fresh().cursorPos(3, 5).carriageReturn();
      expect([builder.nrow, builder.ncol]).toEqual([3, 1]);
    });

    it('line feed moves down without changing the column', () => {
      const builder = fresh().cursorPos(3, 5).lineFeed(2);
      expect([builder.nrow, builder.ncol]).toEqual([5, 5]);
    });

    it('newLine is carriageReturn followed by lineFeed', () => {
      for (const [r, c] of [[1, 1], [3, 3], [2, 9]]) {
        const start = fresh().cursorPos(r, c);
        const a = start.newLine();
        const b = start.carriageReturn().lineFeed();
        expect([a.nrow, a.ncol]).toEqual([b.nrow, b.ncol]);
        expect([a.nrow, a.ncol]).toEqual([r + 1, 1]);
      }
    });
  });

  describe('Writing cells', () => {
    it('writes at the cursor without moving it', () => {
      const builder = fresh().writeCell('x');

      expect(builder.cellAt(1, 1)?.value).toBe('x');
      expect([builder.nrow, builder.ncol]).toEqual([1, 1]);
    });

    it('overwrites an existing value', () => {
      const builder = fresh().writeCell('a').writeCell('b');
      expect(values(builder)).toEqual([['b']]);
    });

    it('anchors cells to the builder nodes and passes trace indices', () => {
      const written = fresh().writeCell(5, { subrow: 2 }).cellAt(1, 1);

      expect(written).toEqual({
        kind: 'cell',
        value: 5,
        role: 'plain',
        row: ROW,
        col: COL,
        subrow: 2,
      });
    });

    it('appends exactly the rows needed to reach the cursor', () => {
      const builder = fresh().cursorPos(4, 1).writeCell('x');

      expect(builder.rowCount).toBe(4);
      expect(builder.width(2)).toBe(0);
      expect(builder.width(3)).toBe(0);
      expect(builder.width(4)).toBe(1);
      expect(builder.cellAt(4, 1)?.value).toBe('x');
    });

    it('pads a row with blank cells up to the cursor column', () => {
      const builder = fresh().cursorPos(1, 3).writeCell('x');

      expect(builder.width(1)).toBe(3);
      expect(builder.cellAt(1, 2)).toEqual(blankCell());
      expect(values(builder)).toEqual([[null, null, 'x']]);
    });

    it('never changes the builder it was called on', () => {
      const original = fresh();
      const moved = original.cursorPos(3, 3);
      const written = moved.writeCell('x');

      expect(original.nrow).toBe(1);
      expect(moved.rowCount).toBe(1);
      expect(written.rowCount).toBe(3);
      expect(values(original)).toEqual([[null]]);
    });
  });

  describe('Bulk writes', () => {
    it('addRow writes downwards and leaves the cursor below the last value', () => {
      const builder = fresh().addRow(['A', 'B', 'C']);

      expect(values(builder)).toEqual([['A'], ['B'], ['C']]);
      expect([builder.nrow, builder.ncol]).toEqual([4, 1]);
    });

    it('addCol writes rightwards and leaves the cursor past the last value', () => {
      const builder = fresh().addCol(['A', 'B', 'C']);

      expect(values(builder)).toEqual([['A', 'B', 'C']]);
      expect([builder.nrow, builder.ncol]).toEqual([1, 4]);
    });

    it('starts bulk writes at the current cursor', () => {
      const builder = fresh().cursorPos(2, 2).addCol(['A', 'B']);

      expect(values(builder)).toEqual([[null], [null, 'A', 'B']]);
      expect([builder.nrow, builder.ncol]).toEqual([2, 4]);
    });

    it('flattens sequences and count vectors into one cell each', () => {
      const builder = fresh().addCol(['label', [1, 2], counts([30, 40], 'subjects')]);

      expect(values(builder)).toEqual([[
        'label',
        1,
        2,
        cellCount(30, 'subjects'),
        cellCount(40, 'subjects'),
      ]]);
    });

    it('passes trace indices to every written cell', () => {
      const builder = fresh().addRow([[1, 2]], { subcol: 3 });

      expect(builder.cellAt(1, 1)?.subcol).toBe(3);
      expect(builder.cellAt(2, 1)?.subcol).toBe(3);
      expect(builder.cellAt(2, 1)?.subrow).toBeUndefined();
    });

    it('apply folds a function over items', () => {
      const builder = fresh().apply([1, 2, 3], (b, x) => b.writeCell(x * 10).cursorRight());

      expect(values(builder)).toEqual([[10, 20, 30]]);
      expect(builder.ncol).toBe(4);
    });
  });

  describe('Opening rows and columns', () => {
    it('newRow moves to the first column of the first unused row', () => {
      expect(fresh().newRow().nrow).toBe(2);

      const builder = fresh().cursorPos(1, 3).addRow(['A', 'B']).newRow();
      expect([builder.nrow, builder.ncol]).toEqual([3, 1]);
    });

    it('newCol moves past the last used column of the first row', () => {
      const builder = fresh()
        .addCol(['A', 'B', 'C'])
        .newLine()
        .addCol(['x'])
        .newCol();

      expect([builder.nrow, builder.ncol]).toEqual([1, 4]);
    });

    it('lays out a block below and beside earlier blocks', () => {
      const builder = fresh()
        .addCol(['A', 'B'])
        .newRow()
        .addCol(['C'])
        .newCol()
        .addRow(['D', 'E']);

      expect(values(builder)).toEqual([
        ['A', 'B', 'D'],
        ['C', null, 'E'],
      ]);
    });
  });
});
