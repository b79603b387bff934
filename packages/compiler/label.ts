/**
 * label derivation - turns an AST node (with reducer data attached) into a
 * display label, splitting "name(units)" when present
 */

import type { LabelSource } from '../parser/ast.js';
import { cellLabel, type LabelContent } from './cell.js';

const LABEL_WITH_UNITS = /(.*)\((.*)\)/;

/**
 * Derive the label of a node.
 *
 * Starts from the node name, then applies `data.label` (split into text and
 * units when it reads "name(units)"), then `data.units`, which always wins.
 * Missing or malformed data leaves the name-only label.
 */
export function deriveLabel(node: LabelSource): LabelContent {
  let text = node.name;
  let units: string | undefined;

  const label = node.data?.label;
  if (typeof label === 'string') {
    const match = LABEL_WITH_UNITS.exec(label);
    if (match) {
      text = match[1] ?? label;
      units = match[2];
    } else {
      text = label;
    }
  }

  const explicitUnits = node.data?.units;
  if (typeof explicitUnits === 'string') {
    units = explicitUnits;
  }

  return cellLabel(text, units);
}
