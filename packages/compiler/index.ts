/**
 * compiler package
 *
 * pipeline: formula → AST (+ reducer data) → TableBuilder chain → CellTable → HTML
 */

// cells
export {
  cell,
  blankCell,
  cellLabel,
  cellCount,
  cellTable,
  isCell,
  isLabelContent,
  isCountContent,
  hasRole,
  roleSatisfies,
  formatCellContent,
  printTable,
  printHeader,
} from './cell.js';
export type {
  Cell,
  CellAnchor,
  CellContent,
  CellRole,
  CellTable,
  CellTrace,
  CountContent,
  Header,
  HeaderLevel,
  LabelContent,
  TableElement,
} from './cell.js';

// errors
export { CursorBoundsError } from './errors.js';

// label derivation
export { deriveLabel } from './label.js';

// element flattening
export { flattenElements, counts, range } from './flatten.js';
export type { CountVector, TableElements } from './flatten.js';

// headers
export { appendHeader, headerRole, topLevelHeaders } from './headers.js';
export type { HeaderAxis } from './headers.js';

// table builder
export { TableBuilder, createTableBuilder } from './table-builder.js';
export type { HeaderOptions } from './table-builder.js';

// table compiler
export { compileTable } from './table-compiler.js';
export type { CellEmitter, TableCompileOptions } from './table-compiler.js';
