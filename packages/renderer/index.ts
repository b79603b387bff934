/**
 * renderer package - CellTable to HTML
 */

export {
  renderTableToHTML,
  type GridRenderOptions,
} from './grid-renderer.js';
