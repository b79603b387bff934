/**
 * Formula Abstract Syntax Tree Type Definitions
 *
 * These types represent the parsed structure of a model formula such as
 * `drug ~ age + sex * weight`. Every node carries a `name` (operator symbol,
 * function name, identifier or literal text) and may carry `data` attached
 * by a reducer before labels are derived.
 */

// ---
// ATTACHED DATA
// ---

/**
 * Attributes a reducer attaches to a node before table compilation.
 */
export interface NodeData {
  /** Display label, possibly carrying units as "name(units)" */
  readonly label?: string;

  /** Units of the underlying values (takes precedence over label units) */
  readonly units?: string;
}

/**
 * Anything a label can be derived from: a name and optional attached data.
 */
export interface LabelSource {
  readonly name: string;
  readonly data?: NodeData;
}

// ---
// NODES
// ---

export type FormulaNode =
  | OperatorNode
  | GroupNode
  | CallNode
  | IdentifierNode
  | NumberNode;

export type BinaryOperator = '~' | '+' | '*' | ':';

/**
 * A binary operator: `~` splits columns (left) from rows (right),
 * `+` concatenates terms, `*` and `:` cross them.
 */
export interface OperatorNode {
  readonly type: 'operator';
  readonly name: BinaryOperator;
  readonly left: FormulaNode;
  readonly right: FormulaNode;
  readonly data?: NodeData;
}

/**
 * A parenthesized sub-expression.
 */
export interface GroupNode {
  readonly type: 'group';
  readonly name: '(';
  readonly inner: FormulaNode;
  readonly data?: NodeData;
}

/**
 * A function applied to arguments, e.g. `log(dose)`.
 */
export interface CallNode {
  readonly type: 'call';
  readonly name: string;
  readonly args: readonly FormulaNode[];
  readonly data?: NodeData;
}

export interface IdentifierNode {
  readonly type: 'identifier';
  readonly name: string;
  readonly data?: NodeData;
}

export interface NumberNode {
  readonly type: 'number';
  readonly name: string;
  readonly value: number;
  readonly data?: NodeData;
}

// ---
// TYPE GUARDS
// ---

/**
 * True for a two-sided formula (`lhs ~ rhs`).
 */
export function isTwoSided(node: FormulaNode): node is OperatorNode & { name: '~' } {
  return node.type === 'operator' && node.name === '~';
}

// ---
// AST WALKING UTILITIES
// ---

/**
 * Visit all nodes in a formula, parents before children.
 */
export function walkFormula(
  node: FormulaNode,
  visitor: (node: FormulaNode, depth: number) => void,
  depth: number = 0
): void {
  visitor(node, depth);

  switch (node.type) {
    case 'operator':
      walkFormula(node.left, visitor, depth + 1);
      walkFormula(node.right, visitor, depth + 1);
      break;

    case 'group':
      walkFormula(node.inner, visitor, depth + 1);
      break;

    case 'call':
      for (const arg of node.args) {
        walkFormula(arg, visitor, depth + 1);
      }
      break;

    case 'identifier':
    case 'number':
      // Leaf node, no children
      break;
  }
}

/**
 * Split a `+` chain into its terms, left to right.
 *
 * `a + b * c + d` becomes: [a, b * c, d]
 * Parenthesized groups are kept whole.
 */
export function terms(node: FormulaNode): FormulaNode[] {
  if (node.type === 'operator' && node.name === '+') {
    return [...terms(node.left), ...terms(node.right)];
  }
  return [node];
}

/**
 * Return a copy of the formula with data attached to every node for which
 * `lookup` yields some. Nodes without a lookup result keep their own data.
 */
export function attachData(
  node: FormulaNode,
  lookup: (node: FormulaNode) => NodeData | undefined
): FormulaNode {
  const data = lookup(node) ?? node.data;

  switch (node.type) {
    case 'operator':
      return {
        ...node,
        left: attachData(node.left, lookup),
        right: attachData(node.right, lookup),
        data,
      };

    case 'group':
      return { ...node, inner: attachData(node.inner, lookup), data };

    case 'call':
      return { ...node, args: node.args.map(arg => attachData(arg, lookup)), data };

    case 'identifier':
    case 'number':
      return { ...node, data };
  }
}

/**
 * Print a formula back to source form (for debugging and labels).
 */
export function printFormula(node: FormulaNode): string {
  switch (node.type) {
    case 'operator':
      if (node.name === ':') {
        return `${printFormula(node.left)}:${printFormula(node.right)}`;
      }
      return `${printFormula(node.left)} ${node.name} ${printFormula(node.right)}`;

    case 'group':
      return `(${printFormula(node.inner)})`;

    case 'call':
      return `${node.name}(${node.args.map(printFormula).join(', ')})`;

    case 'identifier':
    case 'number':
      return node.name;
  }
}
