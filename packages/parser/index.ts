/**
 * Formula Parser - Unified Entry Point
 */

import {
  parse as parseChevrotain,
  parseWithErrors as parseChevrotainWithErrors,
} from './chevrotain-parser.js';
import type { ParseResult } from './chevrotain-parser.js';
import { isTwoSided, printFormula } from './ast.js';
import type { FormulaNode } from './ast.js';

export interface ParseOptions {
  /** Reject formulas without a `~` (default: false) */
  requireTwoSided?: boolean;
}

/**
 * Parse a model formula.
 *
 * @param input - The formula source, e.g. `drug ~ age + sex`
 * @param options - Parser options
 * @returns The parsed AST
 */
export function parseFormula(input: string, options: ParseOptions = {}): FormulaNode {
  const { requireTwoSided = false } = options;

  const ast = parseChevrotain(input);
  if (requireTwoSided && !isTwoSided(ast)) {
    throw new Error(`Expected a two-sided formula (lhs ~ rhs), got: ${printFormula(ast)}`);
  }
  return ast;
}

/**
 * Parse with error recovery.
 * Returns the collected errors instead of throwing.
 */
export function parseFormulaWithErrors(input: string): ParseResult {
  return parseChevrotainWithErrors(input);
}

export type { ParseResult };

// Re-export types
export * from './ast.js';
