/**
 * Formula Parser using Chevrotain
 *
 * A TypeScript-native recursive descent parser for model formulas
 * (`drug ~ age + sex * log(weight)`), producing the FormulaNode AST.
 */

import {
  createToken,
  Lexer,
  CstParser,
  type CstNode,
  type CstElement,
  type IToken,
  type ILexingError,
  type IRecognitionException,
} from 'chevrotain';
import type { FormulaNode } from './ast.js';

// ---
// TOKEN DEFINITIONS
// ---

// Identifiers follow the usual formula conventions: dots are allowed (drug.dose)
const Identifier = createToken({ name: 'Identifier', pattern: /[a-zA-Z_.][a-zA-Z0-9_.]*/ });
const NumberLiteral = createToken({ name: 'NumberLiteral', pattern: /\d+(\.\d+)?/ });

// Operators and punctuation
const Tilde = createToken({ name: 'Tilde', pattern: /~/ });
const Plus = createToken({ name: 'Plus', pattern: /\+/ });
const Star = createToken({ name: 'Star', pattern: /\*/ });
const Colon = createToken({ name: 'Colon', pattern: /:/ });
const LParen = createToken({ name: 'LParen', pattern: /\(/ });
const RParen = createToken({ name: 'RParen', pattern: /\)/ });
const CommaPunct = createToken({ name: 'CommaPunct', pattern: /,/ });

// Whitespace (skipped)
const WhiteSpace = createToken({
  name: 'WhiteSpace',
  pattern: /\s+/,
  group: Lexer.SKIPPED,
});

const allTokens = [
  WhiteSpace,
  NumberLiteral,
  Identifier,
  Tilde,
  Plus,
  Star,
  Colon,
  LParen,
  RParen,
  CommaPunct,
];

const FormulaLexer = new Lexer(allTokens);

// ---
// PARSER
// ---

class FormulaParser extends CstParser {
  constructor() {
    super(allTokens);
    this.performSelfAnalysis();
  }

  // Main entry point: columns ~ rows
  public formula = this.RULE('formula', () => {
    this.SUBRULE(this.expression, { LABEL: 'lhs' });
    this.OPTION(() => {
      this.CONSUME(Tilde);
      this.SUBRULE2(this.expression, { LABEL: 'rhs' });
    });
  });

  // Expression = one or more terms joined by + (concatenation)
  private expression = this.RULE('expression', () => {
    this.SUBRULE(this.term, { LABEL: 'terms' });
    this.MANY(() => {
      this.CONSUME(Plus);
      this.SUBRULE2(this.term, { LABEL: 'terms' });
    });
  });

  // Term = one or more factors joined by * or : (crossing)
  private term = this.RULE('term', () => {
    this.SUBRULE(this.factor, { LABEL: 'factors' });
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(Star, { LABEL: 'ops' }) },
        { ALT: () => this.CONSUME(Colon, { LABEL: 'ops' }) },
      ]);
      this.SUBRULE2(this.factor, { LABEL: 'factors' });
    });
  });

  private factor = this.RULE('factor', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(LParen);
          this.SUBRULE(this.expression, { LABEL: 'inner' });
          this.CONSUME(RParen);
        },
      },
      { ALT: () => this.SUBRULE(this.reference) },
      { ALT: () => this.CONSUME(NumberLiteral) },
    ]);
  });

  // Identifier, optionally applied as a function: log(dose)
  private reference = this.RULE('reference', () => {
    this.CONSUME(Identifier);
    this.OPTION(() => {
      this.CONSUME(LParen);
      this.OPTION2(() => {
        this.SUBRULE(this.expression, { LABEL: 'args' });
        this.MANY(() => {
          this.CONSUME(CommaPunct);
          this.SUBRULE2(this.expression, { LABEL: 'args' });
        });
      });
      this.CONSUME(RParen);
    });
  });
}

const parserInstance = new FormulaParser();

// ---
// CST → AST
// ---

function isCstNode(element: CstElement): element is CstNode {
  return 'children' in element;
}

function isToken(element: CstElement): element is IToken {
  return 'image' in element;
}

function nodesOf(cst: CstNode, key: string): CstNode[] {
  return (cst.children[key] ?? []).filter(isCstNode);
}

function tokensOf(cst: CstNode, key: string): IToken[] {
  return (cst.children[key] ?? []).filter(isToken);
}

function single<T>(items: T[], what: string): T {
  const [first] = items;
  if (first === undefined) {
    throw new Error(`Unexpected ${what} structure`);
  }
  return first;
}

function buildFormula(cst: CstNode): FormulaNode {
  const lhs = buildExpression(single(nodesOf(cst, 'lhs'), 'formula'));
  const rhs = nodesOf(cst, 'rhs');
  if (rhs.length === 0) {
    return lhs;
  }
  return { type: 'operator', name: '~', left: lhs, right: buildExpression(single(rhs, 'formula')) };
}

function buildExpression(cst: CstNode): FormulaNode {
  const [first, ...rest] = nodesOf(cst, 'terms').map(buildTerm);
  if (first === undefined) {
    throw new Error('Unexpected expression structure');
  }
  return rest.reduce<FormulaNode>(
    (left, right) => ({ type: 'operator', name: '+', left, right }),
    first
  );
}

function buildTerm(cst: CstNode): FormulaNode {
  const [first, ...rest] = nodesOf(cst, 'factors').map(buildFactor);
  if (first === undefined) {
    throw new Error('Unexpected term structure');
  }
  const ops = tokensOf(cst, 'ops');
  return rest.reduce<FormulaNode>(
    (left, right, i) => ({
      type: 'operator',
      name: ops[i]?.image === ':' ? ':' : '*',
      left,
      right,
    }),
    first
  );
}

function buildFactor(cst: CstNode): FormulaNode {
  const inner = nodesOf(cst, 'inner');
  if (inner.length > 0) {
    return { type: 'group', name: '(', inner: buildExpression(single(inner, 'group')) };
  }

  const reference = nodesOf(cst, 'reference');
  if (reference.length > 0) {
    return buildReference(single(reference, 'reference'));
  }

  const literal = single(tokensOf(cst, 'NumberLiteral'), 'factor');
  return { type: 'number', name: literal.image, value: Number(literal.image) };
}

function buildReference(cst: CstNode): FormulaNode {
  const name = single(tokensOf(cst, 'Identifier'), 'reference').image;
  if (tokensOf(cst, 'LParen').length === 0) {
    return { type: 'identifier', name };
  }
  return { type: 'call', name, args: nodesOf(cst, 'args').map(buildExpression) };
}

// ---
// PUBLIC API
// ---

export interface ParseResult {
  ast: FormulaNode | null;
  lexErrors: ILexingError[];
  parseErrors: IRecognitionException[];
}

/**
 * Parse a formula using Chevrotain
 */
export function parse(input: string): FormulaNode {
  // Lexing
  const lexResult = FormulaLexer.tokenize(input);
  if (lexResult.errors.length > 0) {
    throw new Error(`Lexer errors: ${lexResult.errors.map(e => e.message).join(', ')}`);
  }

  // Parsing
  parserInstance.input = lexResult.tokens;
  const cst = parserInstance.formula();

  if (parserInstance.errors.length > 0) {
    throw new Error(`Parser errors: ${parserInstance.errors.map(e => e.message).join(', ')}`);
  }

  // AST transformation
  return buildFormula(cst);
}

/**
 * Parse with full result including errors (for error recovery)
 */
export function parseWithErrors(input: string): ParseResult {
  const lexResult = FormulaLexer.tokenize(input);

  parserInstance.input = lexResult.tokens;
  const cst = parserInstance.formula();

  let ast: FormulaNode | null = null;
  if (parserInstance.errors.length === 0 && lexResult.errors.length === 0) {
    ast = buildFormula(cst);
  }

  return {
    ast,
    lexErrors: lexResult.errors,
    parseErrors: parserInstance.errors,
  };
}

