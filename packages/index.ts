/**
 * cursor-table - cursor-addressed table construction
 *
 * Builds labeled tables (rows, columns, nested headers, data cells) by
 * writing values at a cursor, VT100 style, while walking a model formula.
 *
 * @example
 * ```typescript
 * import { parseFormula, attachData, compileTable, renderTableToHTML } from 'cursor-table';
 *
 * const formula = attachData(parseFormula('drug ~ age + weight'), node =>
 *   node.name === 'weight' ? { label: 'Weight(kg)' } : undefined
 * );
 *
 * const { table } = compileTable(formula, (builder, row, col) =>
 *   builder.addCol([summarize(row, col)])
 * );
 *
 * const html = renderTableToHTML(table);
 * ```
 */

// parser
export {
  parseFormula,
  parseFormulaWithErrors,
  attachData,
  terms,
  walkFormula,
  printFormula,
  isTwoSided,
} from './parser/index.js';
export type {
  ParseOptions,
  ParseResult,
  FormulaNode,
  NodeData,
  LabelSource,
} from './parser/index.js';

// compiler
export {
  TableBuilder,
  createTableBuilder,
  CursorBoundsError,
  deriveLabel,
  flattenElements,
  counts,
  range,
  topLevelHeaders,
  compileTable,
  cell,
  cellLabel,
  cellCount,
  hasRole,
  formatCellContent,
  printTable,
} from './compiler/index.js';
export type {
  Cell,
  CellContent,
  CellRole,
  CellTable,
  CellTrace,
  Header,
  HeaderLevel,
  HeaderOptions,
  LabelContent,
  CountContent,
  TableElement,
  TableElements,
  CellEmitter,
  TableCompileOptions,
} from './compiler/index.js';

// renderer
export { renderTableToHTML } from './renderer/index.js';
export type { GridRenderOptions } from './renderer/index.js';
