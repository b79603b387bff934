/**
 * header levels - creating and extending the header attached to a table axis
 *
 * The first level attached to an axis is always a primary header. Later
 * levels are subheaders of the levels before them, unless attached as
 * fresh headers, in which case they start a new top-level header alongside
 * the existing ones.
 */

import type { Cell, CellTable, Header, HeaderLevel } from './cell.js';

export type HeaderAxis = 'row' | 'col';

/**
 * The role a new level gets: a subheader only if asked for and there is
 * something to be sub to.
 */
export function headerRole(existing: Header | undefined, sub: boolean): HeaderLevel['role'] {
  return existing === undefined || !sub ? 'header' : 'subheader';
}

/**
 * Append a level to a header, creating the header if there is none.
 */
export function appendHeader(
  existing: Header | undefined,
  cells: readonly Cell[],
  sub: boolean
): Header {
  const level: HeaderLevel = { role: headerRole(existing, sub), cells };
  return existing === undefined ? [level] : [...existing, level];
}

export function getHeader(table: CellTable, axis: HeaderAxis): Header | undefined {
  return axis === 'row' ? table.rowHeader : table.colHeader;
}

export function setHeader(table: CellTable, axis: HeaderAxis, header: Header): CellTable {
  return axis === 'row' ? { ...table, rowHeader: header } : { ...table, colHeader: header };
}

/**
 * Group header levels into top-level headers: each 'header' level starts a
 * group, followed by the subheader levels beneath it.
 *
 * [header A, subheader B, header C] becomes: [[A, B], [C]]
 */
export function topLevelHeaders(header: Header): Header[] {
  const groups: HeaderLevel[][] = [];

  for (const level of header) {
    const current = groups[groups.length - 1];
    if (level.role === 'header' || current === undefined) {
      groups.push([level]);
    } else {
      current.push(level);
    }
  }

  return groups;
}
